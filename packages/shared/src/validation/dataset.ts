import { z } from 'zod';
import {
  DATASET_NAME_MAX_LENGTH,
  DATASET_UUID_LENGTH,
  FORBIDDEN_QUERY_OPERATORS,
  REGISTRABLE_DATASET_TYPE,
  URI_MAX_LENGTH,
} from '../constants/index.js';

function requiredString(key: string) {
  return z.string({
    required_error: `Missing required key "${key}"`,
    invalid_type_error: `Key "${key}" must be a string`,
  });
}

// Extra keys are kept: the descriptive document is free-form beyond the required ones.
export const datasetInfoSchema = z
  .object({
    uuid: requiredString('uuid').length(
      DATASET_UUID_LENGTH,
      `uuid must be exactly ${DATASET_UUID_LENGTH} characters`,
    ),
    base_uri: requiredString('base_uri')
      .min(1, 'base_uri must not be empty')
      .max(URI_MAX_LENGTH, `base_uri must be at most ${URI_MAX_LENGTH} characters`)
      .refine((v) => !v.endsWith('/'), {
        message: 'base_uri must not end with a trailing slash',
      }),
    uri: requiredString('uri')
      .min(1, 'uri must not be empty')
      .max(URI_MAX_LENGTH, `uri must be at most ${URI_MAX_LENGTH} characters`),
    name: requiredString('name').max(
      DATASET_NAME_MAX_LENGTH,
      `name must be at most ${DATASET_NAME_MAX_LENGTH} characters`,
    ),
    type: z.literal(REGISTRABLE_DATASET_TYPE, {
      errorMap: () => ({
        message: `type must be "${REGISTRABLE_DATASET_TYPE}"; protodatasets cannot be registered`,
      }),
    }),
    readme: requiredString('readme'),
  })
  .passthrough();

// Operators may sit under $or, $and, $nor, $expr or inside arrays, so walk the whole query.
function containsForbiddenOperator(value: unknown): boolean {
  if (Array.isArray(value)) {
    return value.some(containsForbiddenOperator);
  }
  if (typeof value !== 'object' || value === null) return false;

  return Object.entries(value).some(
    ([key, nested]) =>
      FORBIDDEN_QUERY_OPERATORS.some((op) => op === key) || containsForbiddenOperator(nested),
  );
}

export const searchQuerySchema = z
  .record(z.string(), z.unknown())
  .refine((query) => !containsForbiddenOperator(query), {
    message: `Query operators ${FORBIDDEN_QUERY_OPERATORS.join(', ')} are not allowed`,
  });

export const readmeRequestSchema = z.object({
  uri: z.string().min(1),
});

export type DatasetInfoInput = z.infer<typeof datasetInfoSchema>;
export type SearchQueryInput = z.infer<typeof searchQuerySchema>;
export type ReadmeRequestInput = z.infer<typeof readmeRequestSchema>;
