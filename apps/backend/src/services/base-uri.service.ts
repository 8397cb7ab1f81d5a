import type { BaseUriPermissions } from '@dataset-lookup/shared';
import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import { validationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('BaseUriService');

// Canonical form has no trailing slash: "s3://bucket/" -> "s3://bucket".
export function canonicalizeBaseUri(baseUri: string): string {
  return baseUri.replace(/\/+$/, '');
}

export class BaseUriService {
  constructor(private readonly adminStore: AdminMetadataStore) {}

  async registerBaseUri(baseUri: string): Promise<string> {
    const canonical = canonicalizeBaseUri(baseUri.trim());
    if (canonical.length === 0) {
      throw validationError(`Invalid base URI: ${baseUri}`, 'base_uri');
    }

    await this.adminStore.registerBaseUri(canonical);
    logger.info({ baseUri: canonical }, 'Base URI registered');
    return canonical;
  }

  async listBaseUris(): Promise<BaseUriPermissions[]> {
    return this.adminStore.listBaseUris();
  }
}
