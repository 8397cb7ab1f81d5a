import { z } from 'zod';
import { URI_MAX_LENGTH } from '../constants/index.js';

export const baseUriSchema = z.object({
  base_uri: z
    .string()
    .trim()
    .min(1, 'base_uri must not be empty')
    .max(URI_MAX_LENGTH, `base_uri must be at most ${URI_MAX_LENGTH} characters`),
});

export const updatePermissionsSchema = z.object({
  base_uri: z.string().min(1),
  users_with_search_permissions: z.array(z.string().min(1)).default([]),
  users_with_register_permissions: z.array(z.string().min(1)).default([]),
});

export type BaseUriInput = z.infer<typeof baseUriSchema>;
export type UpdatePermissionsInput = z.infer<typeof updatePermissionsSchema>;
