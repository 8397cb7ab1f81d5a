import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ErrorCodes } from '@dataset-lookup/shared';
import type { Database } from '../db/index.js';
import { DrizzleAdminMetadataStore } from './drizzle-admin-metadata.store.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Build a minimal drizzle-style fluent chain whose limit() resolves to `rows`. */
function buildSelectChain(rows: unknown[]) {
  const chain = {
    from: vi.fn(),
    where: vi.fn(),
    limit: vi.fn(),
  };
  chain.from.mockReturnValue(chain);
  chain.where.mockReturnValue(chain);
  chain.limit.mockResolvedValue(rows);
  return chain;
}

/** insert(table).values(...) chain; `settle` produces what the insert resolves or rejects with. */
function buildInsertChain(settle: () => Promise<unknown>) {
  const values = vi.fn().mockImplementation(() =>
    Object.assign(settle(), { onConflictDoNothing: vi.fn().mockResolvedValue(undefined) }),
  );
  return { values };
}

function uniqueViolation(): Error {
  return Object.assign(new Error('duplicate key value violates unique constraint'), { code: '23505' });
}

const userRow = { id: 1, username: 'alice', isAdmin: false, createdAt: new Date() };
const baseUriRow = { id: 2, baseUri: 's3://bucket', createdAt: new Date() };

const db = {
  select: vi.fn(),
  insert: vi.fn(),
  update: vi.fn(),
  transaction: vi.fn(),
};

let store: DrizzleAdminMetadataStore;

beforeEach(() => {
  vi.clearAllMocks();
  store = new DrizzleAdminMetadataStore(db as unknown as Database);
});

// ---------------------------------------------------------------------------
// Tests
// ---------------------------------------------------------------------------

describe('DrizzleAdminMetadataStore – users', () => {
  it('should throw UNAUTHORIZED when the user does not exist', async () => {
    db.select.mockReturnValue(buildSelectChain([]));

    await expect(store.getUser('mallory')).rejects.toMatchObject({
      name: 'AppError',
      code: ErrorCodes.UNAUTHORIZED,
      statusCode: 401,
      message: 'User not registered: mallory',
    });
  });

  it('should report whether a user exists', async () => {
    db.select.mockReturnValueOnce(buildSelectChain([userRow]));
    expect(await store.userExists('alice')).toBe(true);

    db.select.mockReturnValueOnce(buildSelectChain([]));
    expect(await store.userExists('mallory')).toBe(false);
  });

  it('should skip usernames the insert did not create, and repeats in the same call', async () => {
    const returning = vi.fn().mockResolvedValueOnce([{ id: 1 }]).mockResolvedValueOnce([]);
    const onConflictDoNothing = vi.fn().mockReturnValue({ returning });
    const values = vi.fn().mockReturnValue({ onConflictDoNothing });
    const tx = { insert: vi.fn().mockReturnValue({ values }) };
    db.transaction.mockImplementation(async (callback: (t: typeof tx) => Promise<void>) => callback(tx));

    const result = await store.registerUsers([
      { username: 'alice', is_admin: true },
      { username: 'bob' },
      { username: 'alice' },
    ]);

    expect(result).toEqual({ registered: ['alice'], skipped: ['bob', 'alice'] });
    expect(tx.insert).toHaveBeenCalledTimes(2);
    expect(values).toHaveBeenNthCalledWith(1, { username: 'alice', isAdmin: true });
    expect(values).toHaveBeenNthCalledWith(2, { username: 'bob', isAdmin: false });
  });

  it('should throw NOT_FOUND when setting is_admin on an unknown user', async () => {
    const returning = vi.fn().mockResolvedValue([]);
    const where = vi.fn().mockReturnValue({ returning });
    const set = vi.fn().mockReturnValue({ where });
    db.update.mockReturnValue({ set });

    await expect(store.setUserIsAdmin('mallory', true)).rejects.toMatchObject({
      code: ErrorCodes.NOT_FOUND,
      statusCode: 404,
    });
    expect(set).toHaveBeenCalledWith({ isAdmin: true });
  });
});

describe('DrizzleAdminMetadataStore – base URIs', () => {
  it('should throw VALIDATION_ERROR for an unregistered base URI', async () => {
    db.select.mockReturnValue(buildSelectChain([]));

    await expect(store.getBaseUri('s3://unknown')).rejects.toMatchObject({
      code: ErrorCodes.VALIDATION_ERROR,
      field: 'base_uri',
      message: 'Base URI s3://unknown not registered',
    });
  });

  it('should map a unique violation on register to CONFLICT', async () => {
    db.insert.mockReturnValue(buildInsertChain(() => Promise.reject(uniqueViolation())));

    await expect(store.registerBaseUri('s3://bucket')).rejects.toMatchObject({
      code: ErrorCodes.CONFLICT,
      statusCode: 409,
      message: 'Base URI s3://bucket already registered',
    });
  });

  it('should not treat a constraint name in the message as a unique violation', async () => {
    const failure = Object.assign(new Error('value too long for "base_uris_base_uri_unique"'), { code: '22001' });
    db.insert.mockReturnValue(buildInsertChain(() => Promise.reject(failure)));

    await expect(store.registerBaseUri('s3://bucket')).rejects.toBe(failure);
  });

  it('should rethrow other insert failures unchanged', async () => {
    const failure = new Error('connection terminated');
    db.insert.mockReturnValue(buildInsertChain(() => Promise.reject(failure)));

    await expect(store.registerBaseUri('s3://bucket')).rejects.toBe(failure);
  });
});

describe('DrizzleAdminMetadataStore – insertAdminRecord', () => {
  const record = { uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee', base_uri: 's3://bucket', uri: 's3://bucket/abc', name: 'n' };

  it('should insert with the resolved base URI id', async () => {
    db.select.mockReturnValue(buildSelectChain([baseUriRow]));
    const chain = buildInsertChain(() => Promise.resolve(undefined));
    db.insert.mockReturnValue(chain);

    await store.insertAdminRecord(record);

    expect(chain.values).toHaveBeenCalledWith({
      uuid: record.uuid,
      uri: record.uri,
      baseUriId: 2,
      name: 'n',
    });
  });

  it('should throw CONFLICT when the URI was inserted concurrently', async () => {
    db.select.mockReturnValue(buildSelectChain([baseUriRow]));
    db.insert.mockReturnValue(buildInsertChain(() => Promise.reject(uniqueViolation())));

    await expect(store.insertAdminRecord(record)).rejects.toMatchObject({
      code: ErrorCodes.CONFLICT,
      statusCode: 409,
    });
  });

  it('should throw VALIDATION_ERROR without inserting when the base URI is unknown', async () => {
    db.select.mockReturnValue(buildSelectChain([]));

    await expect(store.insertAdminRecord(record)).rejects.toMatchObject({
      code: ErrorCodes.VALIDATION_ERROR,
    });
    expect(db.insert).not.toHaveBeenCalled();
  });
});

describe('DrizzleAdminMetadataStore – permission grants', () => {
  it('should insert the edge and report it when user and base URI exist', async () => {
    db.select
      .mockReturnValueOnce(buildSelectChain([userRow]))
      .mockReturnValueOnce(buildSelectChain([baseUriRow]));
    const chain = buildInsertChain(() => Promise.resolve(undefined));
    db.insert.mockReturnValue(chain);

    expect(await store.grantSearch('alice', 's3://bucket')).toBe(true);
    expect(chain.values).toHaveBeenCalledWith({ userId: 1, baseUriId: 2 });
  });

  it('should skip an unknown user without inserting', async () => {
    db.select
      .mockReturnValueOnce(buildSelectChain([]))
      .mockReturnValueOnce(buildSelectChain([baseUriRow]));

    expect(await store.grantRegister('mallory', 's3://bucket')).toBe(false);
    expect(db.insert).not.toHaveBeenCalled();
  });

  it('should deny a permission check for an unknown base URI', async () => {
    db.select
      .mockReturnValueOnce(buildSelectChain([userRow]))
      .mockReturnValueOnce(buildSelectChain([]));

    expect(await store.hasSearchPermission('alice', 's3://unknown')).toBe(false);
    expect(db.select).toHaveBeenCalledTimes(2);
  });
});
