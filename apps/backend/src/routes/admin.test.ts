import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { ErrorCodes } from '@dataset-lookup/shared';
import { buildApp } from '../app.js';
import type { Authenticator } from '../middleware/auth.js';
import { InMemoryAdminMetadataStore } from '../stores/memory-admin-metadata.store.js';
import { InMemoryDescriptiveMetadataStore } from '../stores/memory-descriptive-metadata.store.js';
import { unauthorized } from '../utils/errors.js';

const headerAuthenticator: Authenticator = async (request) => {
  const username = request.headers['x-test-user'];
  if (typeof username !== 'string') {
    throw unauthorized('Authentication required');
  }
  return username;
};

let app: FastifyInstance;
let adminStore: InMemoryAdminMetadataStore;

beforeEach(async () => {
  adminStore = new InMemoryAdminMetadataStore();
  await adminStore.registerUsers([{ username: 'root', is_admin: true }, { username: 'alice' }]);

  app = await buildApp({
    adminStore,
    descriptiveStore: new InMemoryDescriptiveMetadataStore(),
    authenticate: headerAuthenticator,
    logger: false,
  });
  await app.ready();
});

afterEach(async () => {
  await app.close();
});

function asAdmin(method: 'GET' | 'POST' | 'PUT', url: string, payload?: object) {
  return app.inject({ method, url: `/admin${url}`, headers: { 'x-test-user': 'root' }, payload });
}

// ---------------------------------------------------------------------------
// Access control
// ---------------------------------------------------------------------------

describe('admin access control', () => {
  it('should return 403 for a non-admin user', async () => {
    const response = await app.inject({
      method: 'GET',
      url: '/admin/user/list',
      headers: { 'x-test-user': 'alice' },
    });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      data: null,
      meta: null,
      errors: [{ code: ErrorCodes.FORBIDDEN, field: null, message: 'Admin privileges required' }],
    });
  });

  it('should return 401 without authentication', async () => {
    const response = await app.inject({ method: 'GET', url: '/admin/base_uri/list' });
    expect(response.statusCode).toBe(401);
  });
});

// ---------------------------------------------------------------------------
// Users
// ---------------------------------------------------------------------------

describe('admin user routes', () => {
  it('POST /admin/user/register should register new users and report skipped ones', async () => {
    const response = await asAdmin('POST', '/user/register', [
      { username: 'bob' },
      { username: 'alice', is_admin: true },
    ]);

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({ registered: ['bob'], skipped: ['alice'] });
  });

  it('POST /admin/user/register should reject an empty username', async () => {
    const response = await asAdmin('POST', '/user/register', [{ username: '  ' }]);

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0].field).toBe('0.username');
  });

  it('GET /admin/user/list should list all users', async () => {
    const response = await asAdmin('GET', '/user/list');

    expect(response.statusCode).toBe(200);
    expect(response.json().map((user: { username: string }) => user.username)).toEqual(['alice', 'root']);
  });

  it('PUT /admin/user/:username/is_admin should promote a user', async () => {
    const response = await asAdmin('PUT', '/user/alice/is_admin', { is_admin: true });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ username: 'alice', is_admin: true });
    expect((await adminStore.getUser('alice')).is_admin).toBe(true);
  });

  it('PUT /admin/user/:username/is_admin should return 404 for an unknown user', async () => {
    const response = await asAdmin('PUT', '/user/mallory/is_admin', { is_admin: true });
    expect(response.statusCode).toBe(404);
  });
});

// ---------------------------------------------------------------------------
// Base URIs and permissions
// ---------------------------------------------------------------------------

describe('admin base URI and permission routes', () => {
  it('POST /admin/base_uri/register should store the canonical form', async () => {
    const response = await asAdmin('POST', '/base_uri/register', { base_uri: 's3://bucket/' });

    expect(response.statusCode).toBe(201);
    expect(response.json()).toEqual({ base_uri: 's3://bucket' });
    expect(await adminStore.baseUriExists('s3://bucket')).toBe(true);
  });

  it('POST /admin/base_uri/register should return 409 for a duplicate', async () => {
    await asAdmin('POST', '/base_uri/register', { base_uri: 's3://bucket' });

    const response = await asAdmin('POST', '/base_uri/register', { base_uri: 's3://bucket' });

    expect(response.statusCode).toBe(409);
    expect(response.json().errors[0].code).toBe(ErrorCodes.CONFLICT);
  });

  it('POST /admin/permission/update_on_base_uri should grant and report skipped users', async () => {
    await adminStore.registerBaseUri('s3://bucket');

    const response = await asAdmin('POST', '/permission/update_on_base_uri', {
      base_uri: 's3://bucket',
      users_with_search_permissions: ['alice', 'ghost'],
    });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ base_uri: 's3://bucket', skipped_usernames: ['ghost'] });

    const info = await asAdmin('POST', '/permission/info', { base_uri: 's3://bucket' });
    expect(info.json()).toEqual({
      base_uri: 's3://bucket',
      users_with_search_permissions: ['alice'],
      users_with_register_permissions: [],
    });
  });

  it('POST /admin/permission/update_on_base_uri should return 400 for an unregistered base URI', async () => {
    const response = await asAdmin('POST', '/permission/update_on_base_uri', {
      base_uri: 's3://unknown',
      users_with_search_permissions: ['alice'],
    });

    expect(response.statusCode).toBe(400);
    expect(response.json().errors[0]).toEqual({
      code: ErrorCodes.VALIDATION_ERROR,
      field: 'base_uri',
      message: 'Base URI s3://unknown not registered',
    });
  });

  it('GET /admin/base_uri/list should list base URIs with their grants', async () => {
    await adminStore.registerBaseUri('s3://bucket');
    await adminStore.grantRegister('alice', 's3://bucket');

    const response = await asAdmin('GET', '/base_uri/list');

    expect(response.json()).toEqual([
      { base_uri: 's3://bucket', users_with_search_permissions: [], users_with_register_permissions: ['alice'] },
    ]);
  });

  it('POST /admin/base_uri/datasets should list admin records of the base URI', async () => {
    await adminStore.registerBaseUri('s3://bucket');
    await adminStore.insertAdminRecord({
      uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee',
      base_uri: 's3://bucket',
      uri: 's3://bucket/abc',
      name: 'n',
    });

    const response = await asAdmin('POST', '/base_uri/datasets', { base_uri: 's3://bucket' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual([
      { uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee', base_uri: 's3://bucket', uri: 's3://bucket/abc', name: 'n' },
    ]);
  });
});
