import type { DatasetInfo, DatasetKey, SearchQuery } from '@dataset-lookup/shared';
import type { DescriptiveMetadataStore } from './descriptive-metadata.store.js';

function valuesEqual(a: unknown, b: unknown): boolean {
  return JSON.stringify(a) === JSON.stringify(b);
}

// Top-level equality; an array field also matches when it contains the value.
function matches(document: DatasetInfo, query: SearchQuery): boolean {
  return Object.entries(query).every(([key, expected]) => {
    const actual = document[key];
    if (valuesEqual(actual, expected)) return true;
    return Array.isArray(actual) && actual.some((item) => valuesEqual(item, expected));
  });
}

/**
 * In-memory descriptive metadata store for development and tests.
 * Supports plain field equality only, no query operators.
 */
export class InMemoryDescriptiveMetadataStore implements DescriptiveMetadataStore {
  private documents: DatasetInfo[] = [];

  private indexOf(key: DatasetKey): number {
    return this.documents.findIndex((doc) => doc.uuid === key.uuid && doc.uri === key.uri);
  }

  async findOne(query: SearchQuery): Promise<DatasetInfo | null> {
    const found = this.documents.find((doc) => matches(doc, query));
    return found ? structuredClone(found) : null;
  }

  async *findMany(query: SearchQuery): AsyncIterable<DatasetInfo> {
    for (const doc of this.documents) {
      if (matches(doc, query)) {
        yield structuredClone(doc);
      }
    }
  }

  async upsert(key: DatasetKey, document: DatasetInfo): Promise<DatasetInfo> {
    const { _id, ...replacement } = structuredClone(document);
    const index = this.indexOf(key);
    if (index === -1) {
      this.documents.push(replacement);
    } else {
      this.documents[index] = replacement;
    }
    return structuredClone(replacement);
  }

  async count(): Promise<number> {
    return this.documents.length;
  }
}
