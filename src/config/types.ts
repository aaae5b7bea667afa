/**
 * How a target is reached. Anything else in the config is kept verbatim
 * and classified as an unknown target at deploy time.
 */
export type ExecutionMode = 'local' | 'remote';

/**
 * Private key formats accepted for SSH authentication
 */
export type KeyType = 'pem' | 'ppk';

/**
 * Status values understood by the notification channels
 */
export type DeployEventStatus = 'successful' | 'failed' | 'ignored';

/**
 * Slack notification configuration
 */
export interface SlackNotificationConfig {
  /** Slack incoming webhook URL */
  webhookUrl: string;
  /** Channel override (optional, uses webhook default) */
  channel?: string;
  /** Username override */
  username?: string;
  /** Only notify on failure */
  onlyOnFailure?: boolean;
}

/**
 * Discord notification configuration
 */
export interface DiscordNotificationConfig {
  webhookUrl: string;
  username?: string;
  onlyOnFailure?: boolean;
}

/**
 * Generic webhook notification configuration
 */
export interface WebhookNotificationConfig {
  url: string;
  /** HTTP method (default: POST) */
  method?: 'POST' | 'PUT';
  headers?: Record<string, string>;
  onlyOnFailure?: boolean;
}

/**
 * SMTP email notification configuration
 */
export interface EmailNotificationConfig {
  smtpServer?: string;
  /** 465 uses implicit TLS, anything else STARTTLS when useTls is set */
  smtpPort?: number;
  useTls?: boolean;
  username?: string;
  password?: string;
  /** Defaults to username */
  senderEmail?: string;
  recipients?: string[];
  onlyOnFailure?: boolean;
}

export interface NotificationsConfig {
  slack?: SlackNotificationConfig;
  discord?: DiscordNotificationConfig;
  webhook?: WebhookNotificationConfig;
  email?: EmailNotificationConfig;
}

/**
 * SSH coordinates of a remote target
 */
export interface RemoteConnection {
  host: string;
  port: number;
  user: string;
  keyType: string;
  keyPath: string;
}

/**
 * One deployment destination within a chain
 */
export interface ServerTarget {
  /** Ordinal identifier from the config (server1, server2, ...) */
  key: string;
  /** `local`, `remote`, or whatever unsupported value the config declared */
  executionMode: string;
  /** Only pushes to this branch deploy the target */
  branchFilter: string;
  /** Absolute checkout path, locally or on the remote host */
  workingDirectory: string;
  /** Clone URL, used only when workingDirectory is missing */
  sourceUrl?: string;
  allowDirectoryCreation: boolean;
  /** Rebuild images even when the pull brought nothing new */
  forceRebuildAlways: boolean;
  /** Prefix compose commands with sudo; undefined means infer from the OS */
  useElevatedPrivileges?: boolean;
  /** Present iff executionMode is `remote` */
  remoteConnection?: RemoteConnection;
  /** Shell commands run after sync/rebuild, in order */
  postDeployTasks: string[];
  /** Skip sync/rebuild and only run postDeployTasks */
  tasksOnly: boolean;
}

/**
 * Chain behaviour switches
 */
export interface ChainPolicy {
  /** Keep going after a failed target (default true) */
  continueOnError: boolean;
  /** Send a notification per target, not only the terminal one (default true) */
  notifyTargets: boolean;
  /** Send a `failed` notification when a run is superseded (default false) */
  notifyCancelled: boolean;
}

export interface TimeoutsConfig {
  /** SSH connect timeout in ms */
  connect: number;
  /** Per-command timeout in ms */
  command: number;
}

export const DEFAULT_CHAIN_POLICY: ChainPolicy = {
  continueOnError: true,
  notifyTargets: true,
  notifyCancelled: false,
};

export const DEFAULT_TIMEOUTS: TimeoutsConfig = {
  connect: 15000,
  command: 30 * 60 * 1000,
};

export const DEFAULT_BRANCH = 'main';
export const DEFAULT_SSH_PORT = 22;
export const DEFAULT_HTTP_PORT = 8000;

export function isRemoteTarget(target: ServerTarget): target is ServerTarget & { remoteConnection: RemoteConnection } {
  return target.executionMode === 'remote' && target.remoteConnection !== undefined;
}
