import { describe, it, expect, beforeEach } from 'vitest';
import type { DatasetInfo } from '@dataset-lookup/shared';
import { InMemoryDescriptiveMetadataStore } from './memory-descriptive-metadata.store.js';

function info(uri: string, extra: Record<string, unknown> = {}): DatasetInfo {
  return {
    uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee',
    base_uri: 's3://bucket',
    uri,
    name: 'n',
    type: 'dataset',
    readme: 'r',
    ...extra,
  };
}

async function collect(iterable: AsyncIterable<DatasetInfo>): Promise<DatasetInfo[]> {
  const out: DatasetInfo[] = [];
  for await (const doc of iterable) out.push(doc);
  return out;
}

describe('InMemoryDescriptiveMetadataStore', () => {
  let store: InMemoryDescriptiveMetadataStore;

  beforeEach(() => {
    store = new InMemoryDescriptiveMetadataStore();
  });

  it('should replace the document stored under the same key', async () => {
    const key = { uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee', uri: 's3://bucket/abc' };
    await store.upsert(key, info('s3://bucket/abc', { version: 1 }));
    await store.upsert(key, info('s3://bucket/abc', { version: 2 }));

    expect(await store.count()).toBe(1);
    expect(await store.findOne({ uri: 's3://bucket/abc' })).toEqual(info('s3://bucket/abc', { version: 2 }));
  });

  it('should strip _id and not share state with the caller', async () => {
    const input = info('s3://bucket/abc', { _id: 'internal', tags: ['a'] });
    const stored = await store.upsert({ uuid: input.uuid, uri: input.uri }, input);

    expect(stored).toEqual(info('s3://bucket/abc', { tags: ['a'] }));
    expect(input._id).toBe('internal');

    stored.name = 'changed';
    expect((await store.findOne({ uri: 's3://bucket/abc' }))?.name).toBe('n');
  });

  it('should match on equality and on membership in an array field', async () => {
    await store.upsert({ uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee', uri: 's3://bucket/1' }, info('s3://bucket/1', { tags: ['raw', 'x'] }));
    await store.upsert({ uuid: 'aaaaaaaa-bbbb-cccc-dddd-eeeeeeeeeeee', uri: 's3://bucket/2' }, info('s3://bucket/2', { tags: ['clean'] }));

    expect((await collect(store.findMany({ tags: 'raw' }))).map((d) => d.uri)).toEqual(['s3://bucket/1']);
    expect((await collect(store.findMany({ tags: ['clean'] }))).map((d) => d.uri)).toEqual(['s3://bucket/2']);
    expect((await collect(store.findMany({}))).map((d) => d.uri)).toEqual(['s3://bucket/1', 's3://bucket/2']);
  });

  it('should return null when nothing matches', async () => {
    expect(await store.findOne({ uri: 's3://bucket/missing' })).toBeNull();
  });
});
