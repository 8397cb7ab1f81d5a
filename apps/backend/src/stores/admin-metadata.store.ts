import type {
  AdminMetadata,
  BaseUriPermissions,
  RegisterUserInput,
  RegisterUsersResult,
  UserInfo,
} from '@dataset-lookup/shared';

/**
 * Identity and access-control store: users, base URIs, dataset admin records
 * and the search/register permission edges between users and base URIs.
 *
 * Implementations raise AppErrors: `unauthorized` for unknown usernames where
 * a user is required, `validationError` for unregistered base URIs and
 * `conflict` when a unique key is already taken.
 */
export interface AdminMetadataStore {
  userExists(username: string): Promise<boolean>;
  getUser(username: string): Promise<UserInfo>;
  listUsers(): Promise<UserInfo[]>;
  /** Creates each unknown username; existing ones are skipped, never updated. */
  registerUsers(users: RegisterUserInput[]): Promise<RegisterUsersResult>;
  setUserIsAdmin(username: string, isAdmin: boolean): Promise<void>;

  baseUriExists(baseUri: string): Promise<boolean>;
  getBaseUri(baseUri: string): Promise<BaseUriPermissions>;
  /** Stores the value as given; canonicalization is the caller's job. */
  registerBaseUri(baseUri: string): Promise<void>;
  listBaseUris(): Promise<BaseUriPermissions[]>;

  getAdminRecordByUri(uri: string): Promise<AdminMetadata | null>;
  insertAdminRecord(record: AdminMetadata): Promise<void>;
  listDatasetsForBaseUri(baseUri: string): Promise<AdminMetadata[]>;
  countDatasets(): Promise<number>;
  /** Datasets with this UUID under base URIs the user holds a search grant on. */
  lookupDatasetsByUuid(username: string, uuid: string): Promise<AdminMetadata[]>;

  hasSearchPermission(username: string, baseUri: string): Promise<boolean>;
  hasRegisterPermission(username: string, baseUri: string): Promise<boolean>;
  /** Returns false, without raising, when the user or base URI does not exist. */
  grantSearch(username: string, baseUri: string): Promise<boolean>;
  grantRegister(username: string, baseUri: string): Promise<boolean>;
}
