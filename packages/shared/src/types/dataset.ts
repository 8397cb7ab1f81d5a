/**
 * Identity-bearing record tying a dataset's URI to its UUID, owning base URI
 * and name. Lives in the admin metadata store.
 */
export interface AdminMetadata {
  uuid: string;
  base_uri: string;
  uri: string;
  name: string;
}

/**
 * Free-form descriptive document for a dataset. The required keys are fixed;
 * any further fields are kept verbatim and are searchable.
 */
export interface DatasetInfo {
  uuid: string;
  base_uri: string;
  uri: string;
  name: string;
  type: string;
  readme: string;
  [key: string]: unknown;
}

// Logical key of a descriptive document.
export interface DatasetKey {
  uuid: string;
  uri: string;
}

export type SearchQuery = Record<string, unknown>;

export interface ReadmeResponse {
  readme: string;
}
