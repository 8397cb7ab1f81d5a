import type {
  BaseUriPermissions,
  UpdatePermissionsInput,
  UpdatePermissionsResult,
} from '@dataset-lookup/shared';
import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('PermissionService');

export class PermissionService {
  constructor(private readonly adminStore: AdminMetadataStore) {}

  async checkSearch(username: string, baseUri: string): Promise<boolean> {
    return this.adminStore.hasSearchPermission(username, baseUri);
  }

  async checkRegister(username: string, baseUri: string): Promise<boolean> {
    return this.adminStore.hasRegisterPermission(username, baseUri);
  }

  /**
   * Base URIs the user may list, search and look up datasets in.
   * Throws UNAUTHORIZED when the user is not registered.
   */
  async resolveSearchScope(username: string): Promise<string[]> {
    const user = await this.adminStore.getUser(username);
    return user.search_permissions_on_base_uris;
  }

  async showPermissions(baseUri: string): Promise<BaseUriPermissions> {
    return this.adminStore.getBaseUri(baseUri);
  }

  /**
   * Grant search and register permissions on a base URI.
   *
   * Additive only: edges not mentioned are kept. Usernames that are not
   * registered are skipped and reported back rather than failing the update.
   */
  async updatePermissions(input: UpdatePermissionsInput): Promise<UpdatePermissionsResult> {
    logger.info({ baseUri: input.base_uri }, 'Updating permissions');

    // Throws VALIDATION_ERROR for an unregistered base URI before any grant
    await this.adminStore.getBaseUri(input.base_uri);

    const skipped = new Set<string>();

    for (const username of input.users_with_search_permissions) {
      if (!(await this.adminStore.grantSearch(username, input.base_uri))) {
        skipped.add(username);
      }
    }

    for (const username of input.users_with_register_permissions) {
      if (!(await this.adminStore.grantRegister(username, input.base_uri))) {
        skipped.add(username);
      }
    }

    if (skipped.size > 0) {
      logger.warn(
        { baseUri: input.base_uri, skipped: [...skipped] },
        'Skipped unregistered users while updating permissions',
      );
    }

    return { base_uri: input.base_uri, skipped_usernames: [...skipped] };
  }
}
