import { and, asc, count, eq } from 'drizzle-orm';
import type {
  AdminMetadata,
  BaseUriPermissions,
  RegisterUserInput,
  RegisterUsersResult,
  UserInfo,
} from '@dataset-lookup/shared';
import type { Database } from '../db/index.js';
import {
  users,
  baseUris,
  datasets,
  searchPermissions,
  registerPermissions,
} from '../db/schema/index.js';
import type { BaseUriRow, UserRow } from '../db/schema/index.js';
import {
  conflict,
  isUniqueViolation,
  notFound,
  unauthorized,
  validationError,
} from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { AdminMetadataStore } from './admin-metadata.store.js';

const logger = createLogger('AdminMetadataStore');

// Columns of an admin record, with the base URI resolved through its FK
const adminMetadataColumns = {
  uuid: datasets.uuid,
  base_uri: baseUris.baseUri,
  uri: datasets.uri,
  name: datasets.name,
};

interface EdgeIds {
  userId: number;
  baseUriId: number;
}

function groupBy<K, V>(rows: { key: K; value: V }[]): Map<K, V[]> {
  const grouped = new Map<K, V[]>();
  for (const { key, value } of rows) {
    const values = grouped.get(key);
    if (values) {
      values.push(value);
    } else {
      grouped.set(key, [value]);
    }
  }
  return grouped;
}

export class DrizzleAdminMetadataStore implements AdminMetadataStore {
  constructor(private readonly database: Database) {}

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  private async findUserRow(username: string): Promise<UserRow | null> {
    const [row] = await this.database
      .select()
      .from(users)
      .where(eq(users.username, username))
      .limit(1);
    return row ?? null;
  }

  // Base URIs each user holds a grant on, optionally for one user only
  private async permissionsByUser(userId?: number) {
    const searchRows = await this.database
      .select({ key: searchPermissions.userId, value: baseUris.baseUri })
      .from(searchPermissions)
      .innerJoin(baseUris, eq(searchPermissions.baseUriId, baseUris.id))
      .where(userId === undefined ? undefined : eq(searchPermissions.userId, userId))
      .orderBy(asc(baseUris.baseUri));

    const registerRows = await this.database
      .select({ key: registerPermissions.userId, value: baseUris.baseUri })
      .from(registerPermissions)
      .innerJoin(baseUris, eq(registerPermissions.baseUriId, baseUris.id))
      .where(userId === undefined ? undefined : eq(registerPermissions.userId, userId))
      .orderBy(asc(baseUris.baseUri));

    return { search: groupBy(searchRows), register: groupBy(registerRows) };
  }

  async userExists(username: string): Promise<boolean> {
    return (await this.findUserRow(username)) !== null;
  }

  async getUser(username: string): Promise<UserInfo> {
    const row = await this.findUserRow(username);
    if (!row) {
      throw unauthorized(`User not registered: ${username}`);
    }

    const { search, register } = await this.permissionsByUser(row.id);
    return {
      username: row.username,
      is_admin: row.isAdmin,
      search_permissions_on_base_uris: search.get(row.id) ?? [],
      register_permissions_on_base_uris: register.get(row.id) ?? [],
    };
  }

  async listUsers(): Promise<UserInfo[]> {
    const rows = await this.database.select().from(users).orderBy(asc(users.username));
    const { search, register } = await this.permissionsByUser();

    return rows.map((row) => ({
      username: row.username,
      is_admin: row.isAdmin,
      search_permissions_on_base_uris: search.get(row.id) ?? [],
      register_permissions_on_base_uris: register.get(row.id) ?? [],
    }));
  }

  async registerUsers(input: RegisterUserInput[]): Promise<RegisterUsersResult> {
    const registered: string[] = [];
    const skipped: string[] = [];
    const seen = new Set<string>();

    await this.database.transaction(async (tx) => {
      for (const user of input) {
        if (seen.has(user.username)) {
          skipped.push(user.username);
          continue;
        }
        seen.add(user.username);

        // Existing users are left untouched, including their is_admin flag
        const inserted = await tx
          .insert(users)
          .values({ username: user.username, isAdmin: user.is_admin ?? false })
          .onConflictDoNothing({ target: users.username })
          .returning({ id: users.id });

        if (inserted.length === 0) {
          skipped.push(user.username);
        } else {
          registered.push(user.username);
        }
      }
    });

    logger.info({ registered: registered.length, skipped: skipped.length }, 'Users registered');
    return { registered, skipped };
  }

  async setUserIsAdmin(username: string, isAdmin: boolean): Promise<void> {
    const updated = await this.database
      .update(users)
      .set({ isAdmin })
      .where(eq(users.username, username))
      .returning({ id: users.id });

    if (updated.length === 0) {
      throw notFound(`User not registered: ${username}`);
    }
  }

  // ---------------------------------------------------------------------------
  // Base URIs
  // ---------------------------------------------------------------------------

  private async findBaseUriRow(baseUri: string): Promise<BaseUriRow | null> {
    const [row] = await this.database
      .select()
      .from(baseUris)
      .where(eq(baseUris.baseUri, baseUri))
      .limit(1);
    return row ?? null;
  }

  // Usernames holding a grant on each base URI, optionally for one base URI only
  private async permissionsByBaseUri(baseUriId?: number) {
    const searchRows = await this.database
      .select({ key: searchPermissions.baseUriId, value: users.username })
      .from(searchPermissions)
      .innerJoin(users, eq(searchPermissions.userId, users.id))
      .where(baseUriId === undefined ? undefined : eq(searchPermissions.baseUriId, baseUriId))
      .orderBy(asc(users.username));

    const registerRows = await this.database
      .select({ key: registerPermissions.baseUriId, value: users.username })
      .from(registerPermissions)
      .innerJoin(users, eq(registerPermissions.userId, users.id))
      .where(baseUriId === undefined ? undefined : eq(registerPermissions.baseUriId, baseUriId))
      .orderBy(asc(users.username));

    return { search: groupBy(searchRows), register: groupBy(registerRows) };
  }

  async baseUriExists(baseUri: string): Promise<boolean> {
    return (await this.findBaseUriRow(baseUri)) !== null;
  }

  async getBaseUri(baseUri: string): Promise<BaseUriPermissions> {
    const row = await this.findBaseUriRow(baseUri);
    if (!row) {
      throw validationError(`Base URI ${baseUri} not registered`, 'base_uri');
    }

    const { search, register } = await this.permissionsByBaseUri(row.id);
    return {
      base_uri: row.baseUri,
      users_with_search_permissions: search.get(row.id) ?? [],
      users_with_register_permissions: register.get(row.id) ?? [],
    };
  }

  async registerBaseUri(baseUri: string): Promise<void> {
    try {
      await this.database.insert(baseUris).values({ baseUri });
    } catch (err: unknown) {
      if (isUniqueViolation(err)) {
        throw conflict(`Base URI ${baseUri} already registered`);
      }
      throw err;
    }
  }

  async listBaseUris(): Promise<BaseUriPermissions[]> {
    const rows = await this.database.select().from(baseUris).orderBy(asc(baseUris.baseUri));
    const { search, register } = await this.permissionsByBaseUri();

    return rows.map((row) => ({
      base_uri: row.baseUri,
      users_with_search_permissions: search.get(row.id) ?? [],
      users_with_register_permissions: register.get(row.id) ?? [],
    }));
  }

  // ---------------------------------------------------------------------------
  // Dataset admin records
  // ---------------------------------------------------------------------------

  async getAdminRecordByUri(uri: string): Promise<AdminMetadata | null> {
    const [row] = await this.database
      .select(adminMetadataColumns)
      .from(datasets)
      .innerJoin(baseUris, eq(datasets.baseUriId, baseUris.id))
      .where(eq(datasets.uri, uri))
      .limit(1);
    return row ?? null;
  }

  async insertAdminRecord(record: AdminMetadata): Promise<void> {
    const baseUri = await this.findBaseUriRow(record.base_uri);
    if (!baseUri) {
      throw validationError(`Base URI ${record.base_uri} not registered`, 'base_uri');
    }

    try {
      await this.database.insert(datasets).values({
        uuid: record.uuid,
        uri: record.uri,
        baseUriId: baseUri.id,
        name: record.name,
      });
    } catch (err: unknown) {
      // Lost a race against a concurrent first registration of the same URI
      if (isUniqueViolation(err)) {
        throw conflict(`Dataset ${record.uri} was registered concurrently; retry the registration`);
      }
      throw err;
    }
  }

  async listDatasetsForBaseUri(baseUri: string): Promise<AdminMetadata[]> {
    return this.database
      .select(adminMetadataColumns)
      .from(datasets)
      .innerJoin(baseUris, eq(datasets.baseUriId, baseUris.id))
      .where(eq(baseUris.baseUri, baseUri))
      .orderBy(asc(datasets.id));
  }

  async countDatasets(): Promise<number> {
    const [row] = await this.database.select({ value: count() }).from(datasets);
    return row?.value ?? 0;
  }

  async lookupDatasetsByUuid(username: string, uuid: string): Promise<AdminMetadata[]> {
    return this.database
      .select(adminMetadataColumns)
      .from(datasets)
      .innerJoin(baseUris, eq(datasets.baseUriId, baseUris.id))
      .innerJoin(searchPermissions, eq(searchPermissions.baseUriId, datasets.baseUriId))
      .innerJoin(users, eq(users.id, searchPermissions.userId))
      .where(and(eq(datasets.uuid, uuid), eq(users.username, username)))
      .orderBy(asc(datasets.id));
  }

  // ---------------------------------------------------------------------------
  // Permission edges
  // ---------------------------------------------------------------------------

  private async resolveEdge(username: string, baseUri: string): Promise<EdgeIds | null> {
    const user = await this.findUserRow(username);
    const base = await this.findBaseUriRow(baseUri);
    if (!user || !base) return null;
    return { userId: user.id, baseUriId: base.id };
  }

  async hasSearchPermission(username: string, baseUri: string): Promise<boolean> {
    const edge = await this.resolveEdge(username, baseUri);
    if (!edge) return false;

    const rows = await this.database
      .select({ userId: searchPermissions.userId })
      .from(searchPermissions)
      .where(
        and(
          eq(searchPermissions.userId, edge.userId),
          eq(searchPermissions.baseUriId, edge.baseUriId),
        ),
      )
      .limit(1);
    return rows.length > 0;
  }

  async hasRegisterPermission(username: string, baseUri: string): Promise<boolean> {
    const edge = await this.resolveEdge(username, baseUri);
    if (!edge) return false;

    const rows = await this.database
      .select({ userId: registerPermissions.userId })
      .from(registerPermissions)
      .where(
        and(
          eq(registerPermissions.userId, edge.userId),
          eq(registerPermissions.baseUriId, edge.baseUriId),
        ),
      )
      .limit(1);
    return rows.length > 0;
  }

  async grantSearch(username: string, baseUri: string): Promise<boolean> {
    const edge = await this.resolveEdge(username, baseUri);
    if (!edge) return false;

    await this.database.insert(searchPermissions).values(edge).onConflictDoNothing();
    return true;
  }

  async grantRegister(username: string, baseUri: string): Promise<boolean> {
    const edge = await this.resolveEdge(username, baseUri);
    if (!edge) return false;

    await this.database.insert(registerPermissions).values(edge).onConflictDoNothing();
    return true;
  }
}
