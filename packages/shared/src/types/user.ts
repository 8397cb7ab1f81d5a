export interface UserInfo {
  username: string;
  is_admin: boolean;
  search_permissions_on_base_uris: string[];
  register_permissions_on_base_uris: string[];
}

export interface RegisterUserInput {
  username: string;
  is_admin?: boolean;
}

export interface RegisterUsersResult {
  registered: string[];
  // Usernames that already existed (or repeated in the request) and were left untouched.
  skipped: string[];
}
