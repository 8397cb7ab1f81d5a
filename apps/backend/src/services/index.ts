import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import type { DescriptiveMetadataStore } from '../stores/descriptive-metadata.store.js';
import { BaseUriService } from './base-uri.service.js';
import { PermissionService } from './permission.service.js';
import { QueryService } from './query.service.js';
import { RegistrationService } from './registration.service.js';
import { UserService } from './user.service.js';

export interface Stores {
  adminStore: AdminMetadataStore;
  descriptiveStore: DescriptiveMetadataStore;
}

export interface Services {
  users: UserService;
  baseUris: BaseUriService;
  permissions: PermissionService;
  registration: RegistrationService;
  query: QueryService;
}

// Services hold nothing but the store handles they are given.
export function createServices({ adminStore, descriptiveStore }: Stores): Services {
  const permissions = new PermissionService(adminStore);
  return {
    users: new UserService(adminStore),
    baseUris: new BaseUriService(adminStore),
    permissions,
    registration: new RegistrationService(adminStore, descriptiveStore),
    query: new QueryService(adminStore, descriptiveStore, permissions),
  };
}
