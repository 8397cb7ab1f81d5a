import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import { canonicalizeBaseUri } from '../services/base-uri.service.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('Seed');

export interface SeedOptions {
  adminUsername?: string;
  baseUri?: string;
}

/**
 * Register the bootstrap admin user and base URI, if configured, and grant
 * the admin both permissions on it.
 * Safe to run on every start: existing rows are left as they are.
 */
export async function runSeed(adminStore: AdminMetadataStore, options: SeedOptions): Promise<void> {
  const { adminUsername } = options;

  if (adminUsername) {
    const { registered } = await adminStore.registerUsers([{ username: adminUsername, is_admin: true }]);
    logger.info({ username: adminUsername, created: registered.length > 0 }, 'Admin user ready');
  }

  if (options.baseUri) {
    const baseUri = canonicalizeBaseUri(options.baseUri);
    if (!(await adminStore.baseUriExists(baseUri))) {
      await adminStore.registerBaseUri(baseUri);
    }
    if (adminUsername) {
      await adminStore.grantSearch(adminUsername, baseUri);
      await adminStore.grantRegister(adminUsername, baseUri);
    }
    logger.info({ baseUri }, 'Base URI ready');
  }
}
