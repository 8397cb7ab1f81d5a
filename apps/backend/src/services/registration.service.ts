import { datasetInfoSchema } from '@dataset-lookup/shared';
import type { DatasetInfo } from '@dataset-lookup/shared';
import type { AdminMetadataStore } from '../stores/admin-metadata.store.js';
import type { DescriptiveMetadataStore } from '../stores/descriptive-metadata.store.js';
import { validationError } from '../utils/errors.js';
import { createLogger } from '../utils/logger.js';

const logger = createLogger('RegistrationService');

/**
 * Keeps the admin and descriptive stores coherent when a dataset is
 * registered or re-registered.
 *
 * There is no cross-store transaction. Validation runs to completion before
 * the first write; if the descriptive upsert fails after a new admin record
 * was inserted, the admin record stays and a retry of the same request
 * completes the registration.
 */
export class RegistrationService {
  constructor(
    private readonly adminStore: AdminMetadataStore,
    private readonly descriptiveStore: DescriptiveMetadataStore,
  ) {}

  /** Validate the payload and check that its base URI is registered. */
  async validate(payload: unknown): Promise<DatasetInfo> {
    const result = datasetInfoSchema.safeParse(payload);
    if (!result.success) {
      const firstIssue = result.error.issues[0];
      throw validationError(
        `Dataset info not valid: ${firstIssue?.message ?? 'invalid payload'}`,
        firstIssue?.path.join('.') || undefined,
      );
    }

    const info = result.data;
    if (!(await this.adminStore.baseUriExists(info.base_uri))) {
      throw validationError(`Base URI is not registered: ${info.base_uri}`, 'base_uri');
    }

    return info;
  }

  /**
   * Register a dataset and return its URI.
   *
   * The admin record is created on first registration of a URI and never
   * changed afterwards; the descriptive document is replaced every time.
   */
  async registerDataset(payload: unknown): Promise<string> {
    const info = await this.validate(payload);

    const existing = await this.adminStore.getAdminRecordByUri(info.uri);
    if (existing === null) {
      // A concurrent first registration surfaces here as CONFLICT
      await this.adminStore.insertAdminRecord({
        uuid: info.uuid,
        base_uri: info.base_uri,
        uri: info.uri,
        name: info.name,
      });
      logger.info({ uuid: info.uuid, uri: info.uri }, 'Admin record created');
    }

    await this.descriptiveStore.upsert({ uuid: info.uuid, uri: info.uri }, info);
    logger.info({ uuid: info.uuid, uri: info.uri }, 'Dataset registered');

    return info.uri;
  }
}
