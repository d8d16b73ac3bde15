import { z } from 'zod';
import type { CallerIdentity, PermissionKey } from '@deskflow/types';
import { AuthenticationError } from '@deskflow/core/errors';
import { PERMISSION_KEYS, parsePermissionKey } from './permissionKeys';

const permissionKeySchema = z
  .string()
  .transform((value, ctx): PermissionKey => {
    const key = parsePermissionKey(value);
    if (!key) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Expected one of ${PERMISSION_KEYS.join(', ')}`,
      });
      return z.NEVER;
    }
    return key;
  });

const userIdSchema = z.coerce.number().int().positive();

export const callerIdentitySchema = z.object({
  userId: userIdSchema,
  isQueueAdmin: z.boolean().optional(),
  accessibleQueues: z
    .object({
      capability: permissionKeySchema,
      queueIds: z.array(z.coerce.number().int().positive()),
    })
    .optional(),
});

export type RawCallerIdentity = z.input<typeof callerIdentitySchema>;

/**
 * Builds the typed caller from whatever the authentication boundary supplied.
 * Numeric ids given as strings are coerced; anything else that is not a positive integer is rejected.
 */
export function createCallerIdentity(raw: unknown): CallerIdentity {
  const result = callerIdentitySchema.safeParse(raw);
  if (!result.success) {
    throw new AuthenticationError('Invalid caller identity', {
      issues: result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return result.data;
}
