import type { Collection, Document, FindOptions } from 'mongodb';
import type { DatasetInfo, DatasetKey, SearchQuery } from '@dataset-lookup/shared';
import type { DescriptiveMetadataStore } from './descriptive-metadata.store.js';

// Mongo's ObjectId is internal to the store
const WITHOUT_ID: FindOptions = { projection: { _id: 0 } };

export class MongoDescriptiveMetadataStore implements DescriptiveMetadataStore {
  constructor(private readonly collection: Collection<Document>) {}

  async findOne(query: SearchQuery): Promise<DatasetInfo | null> {
    return this.collection.findOne<DatasetInfo>(query, WITHOUT_ID);
  }

  findMany(query: SearchQuery): AsyncIterable<DatasetInfo> {
    return this.collection.find<DatasetInfo>(query, WITHOUT_ID);
  }

  async upsert(key: DatasetKey, document: DatasetInfo): Promise<DatasetInfo> {
    // Copy without any _id so the caller's object is never touched by the driver
    const { _id, ...replacement } = document;
    await this.collection.replaceOne({ uuid: key.uuid, uri: key.uri }, replacement, {
      upsert: true,
    });
    return replacement;
  }

  async count(): Promise<number> {
    return this.collection.countDocuments();
  }
}
