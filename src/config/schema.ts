import { z } from 'zod';
import { DEFAULT_BENIGN_MARKERS } from '../utils/shell.js';
import {
  DEFAULT_BRANCH,
  DEFAULT_CHAIN_POLICY,
  DEFAULT_HTTP_PORT,
  DEFAULT_SSH_PORT,
  DEFAULT_TIMEOUTS,
} from './types.js';

/**
 * Validation patterns for shell-safe values.
 * Target fields end up inside shell commands, locally and over SSH.
 */
export const VALID_HOST_PATTERN = /^[a-zA-Z0-9._:-]+$/;
export const VALID_USER_PATTERN = /^[a-zA-Z_][a-zA-Z0-9_.-]*$/;
export const VALID_PATH_PATTERN = /^[a-zA-Z0-9_./~-]+$/;
export const VALID_BRANCH_PATTERN = /^[a-zA-Z0-9._/-]+$/;
export const VALID_URL_PATTERN = /^[^\s"'`$;&|<>\\]+$/;

const unsafe = (field: string) => ({ message: `Invalid ${field}: contains unsafe characters.` });

const branchSchema = z.string().min(1).regex(VALID_BRANCH_PATTERN, unsafe('branch'));

export const targetSchema = z.object({
  /** local | remote (other values are reported as unknown targets) */
  target: z.string().min(1),
  branch: branchSchema.default(DEFAULT_BRANCH),
  deployDir: z.string().min(1).regex(VALID_PATH_PATTERN, unsafe('deployDir')),
  cloneUrl: z.string().min(1).regex(VALID_URL_PATTERN, unsafe('cloneUrl')).optional(),
  createDir: z.boolean().default(false),
  forceRebuild: z.boolean().default(false),
  sudo: z.boolean().optional(),
  host: z.string().min(1).regex(VALID_HOST_PATTERN, unsafe('host')).optional(),
  port: z.coerce.number().int().min(1).max(65535).default(DEFAULT_SSH_PORT),
  user: z.string().min(1).regex(VALID_USER_PATTERN, unsafe('user')).optional(),
  keyType: z.string().default('pem'),
  keyPath: z.string().min(1).optional(),
  tasks: z.array(z.string().min(1)).default([]),
  tasksOnly: z.boolean().default(false),
}).superRefine((data, ctx) => {
  if (data.target !== 'remote') return;
  for (const field of ['host', 'user', 'keyPath'] as const) {
    if (!data[field]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: [field],
        message: `'${field}' is required when target is "remote"`,
      });
    }
  }
});

export type TargetConfig = z.infer<typeof targetSchema>;

/**
 * A repository's topology: `serverN` entries are targets, any other key is
 * kept aside (and logged) rather than rejected.
 */
export const repositorySchema = z.record(z.unknown()).transform((entries, ctx) => {
  const targets: Record<string, TargetConfig> = {};
  const ignoredKeys: string[] = [];

  for (const [key, value] of Object.entries(entries)) {
    if (!key.startsWith('server')) {
      ignoredKeys.push(key);
      continue;
    }
    const parsed = targetSchema.safeParse(value);
    if (!parsed.success) {
      for (const issue of parsed.error.issues) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key, ...issue.path], message: issue.message });
      }
      continue;
    }
    targets[key] = parsed.data;
  }

  return { targets, ignoredKeys };
});

export type RepositoryConfig = z.infer<typeof repositorySchema>;

const slackSchema = z.object({
  webhookUrl: z.string().url(),
  channel: z.string().optional(),
  username: z.string().optional(),
  onlyOnFailure: z.boolean().optional(),
});

const discordSchema = z.object({
  webhookUrl: z.string().url(),
  username: z.string().optional(),
  onlyOnFailure: z.boolean().optional(),
});

const webhookSchema = z.object({
  url: z.string().url(),
  method: z.enum(['POST', 'PUT']).optional(),
  headers: z.record(z.string()).optional(),
  onlyOnFailure: z.boolean().optional(),
});

const emailSchema = z.object({
  smtpServer: z.string().min(1).optional(),
  smtpPort: z.coerce.number().int().min(1).max(65535).default(587),
  useTls: z.boolean().default(true),
  username: z.string().optional(),
  password: z.string().optional(),
  senderEmail: z.string().optional(),
  recipients: z.array(z.string().min(1)).default([]),
  onlyOnFailure: z.boolean().optional(),
});

export const configSchema = z.object({
  debug: z.boolean().default(false),
  server: z.object({
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(DEFAULT_HTTP_PORT),
  }).default({}),
  /** Empty disables signature verification */
  webhookSecret: z.string().default(''),
  /** Empty disables the authenticated endpoints */
  deployApiKey: z.string().default(''),
  defaultBranch: branchSchema.default(DEFAULT_BRANCH),
  chain: z.object({
    continueOnError: z.boolean().default(DEFAULT_CHAIN_POLICY.continueOnError),
    notifyTargets: z.boolean().default(DEFAULT_CHAIN_POLICY.notifyTargets),
    notifyCancelled: z.boolean().default(DEFAULT_CHAIN_POLICY.notifyCancelled),
  }).default({}),
  timeouts: z.object({
    connect: z.coerce.number().int().positive().default(DEFAULT_TIMEOUTS.connect),
    command: z.coerce.number().int().nonnegative().default(DEFAULT_TIMEOUTS.command),
  }).default({}),
  benignErrorMarkers: z.array(z.string().min(1)).default([...DEFAULT_BENIGN_MARKERS]),
  notifications: z.object({
    slack: slackSchema.optional(),
    discord: discordSchema.optional(),
    webhook: webhookSchema.optional(),
    email: emailSchema.optional(),
  }).default({}),
  repositories: z.record(repositorySchema).default({}),
});

/**
 * Root configuration file (.chain-deploy.json), after validation and defaults
 */
export type ChainDeployConfig = z.infer<typeof configSchema>;
