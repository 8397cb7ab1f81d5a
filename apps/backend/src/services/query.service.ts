import type { AdminMetadata, DatasetInfo, SearchQuery } from '@dataset-lookup/shared';
import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import type { DescriptiveMetadataStore } from '../stores/descriptive-metadata.store.js';
import { forbidden, notFound } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';
import type { PermissionService } from './permission.service.js';

const logger = createLogger('QueryService');

/**
 * Permission-scoped reads. Every per-user query resolves the user's search
 * scope first, so an unknown username fails with UNAUTHORIZED and a known
 * user without grants gets an empty result.
 */
export class QueryService {
  constructor(
    private readonly adminStore: AdminMetadataStore,
    private readonly descriptiveStore: DescriptiveMetadataStore,
    private readonly permissions: PermissionService,
  ) {}

  async countDatasets(): Promise<number> {
    return this.adminStore.countDatasets();
  }

  // Admin records across every base URI in the user's search scope.
  async listForUser(username: string): Promise<AdminMetadata[]> {
    const scope = await this.permissions.resolveSearchScope(username);

    const datasets: AdminMetadata[] = [];
    for (const baseUri of scope) {
      datasets.push(...(await this.adminStore.listDatasetsForBaseUri(baseUri)));
    }

    logger.debug({ username, baseUris: scope.length, results: datasets.length }, 'Listed datasets');
    return datasets;
  }

  /**
   * Run `query` against the descriptive store once per base URI in scope,
   * with `base_uri` pinned to that URI, and concatenate the results.
   */
  async searchForUser(username: string, query: SearchQuery): Promise<DatasetInfo[]> {
    const scope = await this.permissions.resolveSearchScope(username);

    const datasets: DatasetInfo[] = [];
    for (const baseUri of scope) {
      for await (const doc of this.descriptiveStore.findMany({ ...query, base_uri: baseUri })) {
        datasets.push(doc);
      }
    }

    logger.debug({ username, baseUris: scope.length, results: datasets.length }, 'Searched datasets');
    return datasets;
  }

  async lookupByUuid(username: string, uuid: string): Promise<AdminMetadata[]> {
    // Distinguishes an unknown user from a user who simply sees nothing
    await this.adminStore.getUser(username);
    return this.adminStore.lookupDatasetsByUuid(username, uuid);
  }

  async getReadme(username: string, uri: string): Promise<string> {
    await this.adminStore.getUser(username);

    const admin = await this.adminStore.getAdminRecordByUri(uri);
    if (!admin) {
      throw notFound(`Dataset not registered: ${uri}`);
    }
    if (!(await this.permissions.checkSearch(username, admin.base_uri))) {
      throw forbidden(`No search permission on base URI ${admin.base_uri}`);
    }

    // Not keyed by UUID: re-registering a URI under a new UUID stores a second
    // document, and the one stored last is current. base_uri keeps it in scope.
    let doc: DatasetInfo | null = null;
    for await (const candidate of this.descriptiveStore.findMany({ uri: admin.uri, base_uri: admin.base_uri })) {
      doc = candidate;
    }
    if (!doc) {
      // Admin record written, descriptive document not (yet) stored
      throw notFound(`No descriptive metadata for dataset: ${uri}`);
    }
    return doc.readme;
  }

  async listAdminMetadataInBaseUri(baseUri: string): Promise<AdminMetadata[]> {
    // Throws VALIDATION_ERROR for an unregistered base URI
    await this.adminStore.getBaseUri(baseUri);
    return this.adminStore.listDatasetsForBaseUri(baseUri);
  }
}
