export const ErrorCodes = {
  VALIDATION_ERROR: 'VALIDATION_ERROR',
  NOT_FOUND: 'NOT_FOUND',
  UNAUTHORIZED: 'UNAUTHORIZED',
  FORBIDDEN: 'FORBIDDEN',
  CONFLICT: 'CONFLICT',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Keys every descriptive document must carry before it can be registered.
export const DATASET_INFO_REQUIRED_KEYS = [
  'uuid',
  'base_uri',
  'uri',
  'name',
  'type',
  'readme',
] as const;

export type DatasetInfoRequiredKey = (typeof DATASET_INFO_REQUIRED_KEYS)[number];

export const DATASET_UUID_LENGTH = 36;

// Column widths of the admin metadata tables.
export const DATASET_NAME_MAX_LENGTH = 80;
export const URI_MAX_LENGTH = 255;

// Only frozen datasets are registered; protodatasets are still being written.
export const REGISTRABLE_DATASET_TYPE = 'dataset';

// Query operators that execute server-side code in the document store, at any depth.
export const FORBIDDEN_QUERY_OPERATORS = ['$where', '$function', '$accumulator'] as const;
