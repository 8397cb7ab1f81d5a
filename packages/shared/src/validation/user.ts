import { z } from 'zod';

export const registerUsersSchema = z.array(
  z.object({
    username: z.string().trim().min(1).max(64),
    is_admin: z.boolean().optional(),
  }),
);

export const setIsAdminSchema = z.object({
  is_admin: z.boolean(),
});

export type RegisterUsersInput = z.infer<typeof registerUsersSchema>;
export type SetIsAdminInput = z.infer<typeof setIsAdminSchema>;
