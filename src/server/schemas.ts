import { z } from 'zod';
import { VALID_BRANCH_PATTERN } from '../config/schema.js';

export const deployRequestSchema = z.object({
  repository_full_name: z.string().min(1),
  branch: z.string().regex(VALID_BRANCH_PATTERN, { message: 'Invalid branch: contains unsafe characters.' }).optional(),
  /** Answer with the chain result instead of 202 */
  wait: z.boolean().default(false),
});

export type DeployRequest = z.infer<typeof deployRequestSchema>;

export const listFilesQuerySchema = z.object({
  repository_full_name: z.string().min(1),
  branch: z.string().regex(VALID_BRANCH_PATTERN, { message: 'Invalid branch: contains unsafe characters.' }).optional(),
});

/**
 * The parts of a GitHub push payload the chain needs
 */
export const pushPayloadSchema = z.object({
  ref: z.string().min(1),
  repository: z.object({
    full_name: z.string().min(1),
  }).passthrough(),
}).passthrough();

export type PushPayload = z.infer<typeof pushPayloadSchema>;

const HEADS_PREFIX = 'refs/heads/';

export function branchFromRef(ref: string): string {
  return ref.startsWith(HEADS_PREFIX) ? ref.slice(HEADS_PREFIX.length) : ref;
}
