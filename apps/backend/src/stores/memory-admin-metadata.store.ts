import type {
  AdminMetadata,
  BaseUriPermissions,
  RegisterUserInput,
  RegisterUsersResult,
  UserInfo,
} from '@dataset-lookup/shared';
import { conflict, notFound, unauthorized, validationError } from '../utils/errors.js';
import type { AdminMetadataStore } from './admin-metadata.store.js';

/**
 * In-memory admin metadata store for development and tests.
 * Mirrors the ordering of the Postgres store: users and base URIs sorted by
 * name, datasets in insertion order. Not persistent.
 */
export class InMemoryAdminMetadataStore implements AdminMetadataStore {
  private readonly users = new Map<string, { isAdmin: boolean }>();
  private readonly baseUris = new Set<string>();
  // Keyed by URI, the dedup key of admin records
  private readonly datasets = new Map<string, AdminMetadata>();
  private readonly searchEdges = new Map<string, Set<string>>();
  private readonly registerEdges = new Map<string, Set<string>>();

  private usernamesWithEdge(edges: Map<string, Set<string>>, baseUri: string): string[] {
    return [...edges.entries()]
      .filter(([, uris]) => uris.has(baseUri))
      .map(([username]) => username)
      .sort();
  }

  private toUserInfo(username: string, isAdmin: boolean): UserInfo {
    return {
      username,
      is_admin: isAdmin,
      search_permissions_on_base_uris: [...(this.searchEdges.get(username) ?? [])].sort(),
      register_permissions_on_base_uris: [...(this.registerEdges.get(username) ?? [])].sort(),
    };
  }

  private toBaseUriPermissions(baseUri: string): BaseUriPermissions {
    return {
      base_uri: baseUri,
      users_with_search_permissions: this.usernamesWithEdge(this.searchEdges, baseUri),
      users_with_register_permissions: this.usernamesWithEdge(this.registerEdges, baseUri),
    };
  }

  async userExists(username: string): Promise<boolean> {
    return this.users.has(username);
  }

  async getUser(username: string): Promise<UserInfo> {
    const user = this.users.get(username);
    if (!user) {
      throw unauthorized(`User not registered: ${username}`);
    }
    return this.toUserInfo(username, user.isAdmin);
  }

  async listUsers(): Promise<UserInfo[]> {
    return [...this.users.keys()]
      .sort()
      .map((username) => this.toUserInfo(username, this.users.get(username)?.isAdmin ?? false));
  }

  async registerUsers(input: RegisterUserInput[]): Promise<RegisterUsersResult> {
    const registered: string[] = [];
    const skipped: string[] = [];

    for (const user of input) {
      if (this.users.has(user.username)) {
        skipped.push(user.username);
        continue;
      }
      this.users.set(user.username, { isAdmin: user.is_admin ?? false });
      registered.push(user.username);
    }

    return { registered, skipped };
  }

  async setUserIsAdmin(username: string, isAdmin: boolean): Promise<void> {
    if (!this.users.has(username)) {
      throw notFound(`User not registered: ${username}`);
    }
    this.users.set(username, { isAdmin });
  }

  async baseUriExists(baseUri: string): Promise<boolean> {
    return this.baseUris.has(baseUri);
  }

  async getBaseUri(baseUri: string): Promise<BaseUriPermissions> {
    if (!this.baseUris.has(baseUri)) {
      throw validationError(`Base URI ${baseUri} not registered`, 'base_uri');
    }
    return this.toBaseUriPermissions(baseUri);
  }

  async registerBaseUri(baseUri: string): Promise<void> {
    if (this.baseUris.has(baseUri)) {
      throw conflict(`Base URI ${baseUri} already registered`);
    }
    this.baseUris.add(baseUri);
  }

  async listBaseUris(): Promise<BaseUriPermissions[]> {
    return [...this.baseUris].sort().map((baseUri) => this.toBaseUriPermissions(baseUri));
  }

  async getAdminRecordByUri(uri: string): Promise<AdminMetadata | null> {
    const record = this.datasets.get(uri);
    return record ? { ...record } : null;
  }

  async insertAdminRecord(record: AdminMetadata): Promise<void> {
    if (!this.baseUris.has(record.base_uri)) {
      throw validationError(`Base URI ${record.base_uri} not registered`, 'base_uri');
    }
    if (this.datasets.has(record.uri)) {
      throw conflict(`Dataset ${record.uri} was registered concurrently; retry the registration`);
    }
    this.datasets.set(record.uri, {
      uuid: record.uuid,
      base_uri: record.base_uri,
      uri: record.uri,
      name: record.name,
    });
  }

  async listDatasetsForBaseUri(baseUri: string): Promise<AdminMetadata[]> {
    return [...this.datasets.values()]
      .filter((record) => record.base_uri === baseUri)
      .map((record) => ({ ...record }));
  }

  async countDatasets(): Promise<number> {
    return this.datasets.size;
  }

  async lookupDatasetsByUuid(username: string, uuid: string): Promise<AdminMetadata[]> {
    const scope = this.searchEdges.get(username) ?? new Set<string>();
    return [...this.datasets.values()]
      .filter((record) => record.uuid === uuid && scope.has(record.base_uri))
      .map((record) => ({ ...record }));
  }

  async hasSearchPermission(username: string, baseUri: string): Promise<boolean> {
    return this.searchEdges.get(username)?.has(baseUri) ?? false;
  }

  async hasRegisterPermission(username: string, baseUri: string): Promise<boolean> {
    return this.registerEdges.get(username)?.has(baseUri) ?? false;
  }

  private grant(edges: Map<string, Set<string>>, username: string, baseUri: string): boolean {
    if (!this.users.has(username) || !this.baseUris.has(baseUri)) return false;

    const granted = edges.get(username);
    if (granted) {
      granted.add(baseUri);
    } else {
      edges.set(username, new Set([baseUri]));
    }
    return true;
  }

  async grantSearch(username: string, baseUri: string): Promise<boolean> {
    return this.grant(this.searchEdges, username, baseUri);
  }

  async grantRegister(username: string, baseUri: string): Promise<boolean> {
    return this.grant(this.registerEdges, username, baseUri);
  }
}
