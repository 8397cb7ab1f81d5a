export interface BaseUriPermissions {
  base_uri: string;
  users_with_search_permissions: string[];
  users_with_register_permissions: string[];
}

export interface UpdatePermissionsResult {
  base_uri: string;
  skipped_usernames: string[];
}
