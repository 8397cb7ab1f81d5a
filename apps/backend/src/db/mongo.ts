import { MongoClient, type Collection, type Document } from 'mongodb';

export interface DescriptiveStoreConnection {
  client: MongoClient;
  collection: Collection<Document>;
}

/**
 * Connect to the document store and make sure the collection carries the
 * indexes the lookup service relies on.
 */
export async function connectDescriptiveStore(
  url: string,
  dbName: string,
  collectionName: string,
): Promise<DescriptiveStoreConnection> {
  const client = new MongoClient(url, {
    serverSelectionTimeoutMS: 2000,
  });
  await client.connect();

  const collection = client.db(dbName).collection(collectionName);
  // One live document per (uuid, uri); concurrent upserts converge on it
  await collection.createIndex({ uuid: 1, uri: 1 }, { unique: true, name: 'uuid_uri_unique' });
  // Every search is pinned to one base URI
  await collection.createIndex({ base_uri: 1 }, { name: 'base_uri' });

  return { client, collection };
}
