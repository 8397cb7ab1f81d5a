import type { DatasetInfo, DatasetKey, SearchQuery } from '@dataset-lookup/shared';

/**
 * Document store holding one descriptive document per (uuid, uri).
 * Store-internal identifiers never leave an implementation.
 */
export interface DescriptiveMetadataStore {
  findOne(query: SearchQuery): Promise<DatasetInfo | null>;
  findMany(query: SearchQuery): AsyncIterable<DatasetInfo>;
  /** Atomic replace-or-insert of the whole document stored under `key`. */
  upsert(key: DatasetKey, document: DatasetInfo): Promise<DatasetInfo>;
  count(): Promise<number>;
}
