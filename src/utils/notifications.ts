import nodemailer from 'nodemailer';
import type {
  DeployEventStatus,
  DiscordNotificationConfig,
  EmailNotificationConfig,
  NotificationsConfig,
  SlackNotificationConfig,
  WebhookNotificationConfig,
} from '../config/types.js';
import { toErrorMessage } from './errors.js';
import { silentLogger, type Logger } from './logger.js';

/**
 * One deploy event as delivered to the channels
 */
export interface DeployEvent {
  repository: string;
  branch: string;
  status: DeployEventStatus;
  details: string;
  timestamp: string;
}

/**
 * Receives deploy events from the chain. Implementations must not throw.
 */
export interface Notifier {
  notifyDeployEvent(repository: string, branch: string, status: DeployEventStatus, details: string): Promise<void>;
}

const STATUS_STYLE: Record<DeployEventStatus, { emoji: string; discordEmoji: string; color: string }> = {
  successful: { emoji: ':white_check_mark:', discordEmoji: '✅', color: '#36a64f' },
  failed: { emoji: ':x:', discordEmoji: '❌', color: '#dc3545' },
  ignored: { emoji: ':fast_forward:', discordEmoji: '⏭️', color: '#9e9e9e' },
};

/**
 * Plain-text rendering shared by every channel
 */
export function formatDeployMessage(event: DeployEvent): string {
  return [
    '🚀 *Deploy Event*',
    `- *Repository*: ${event.repository}`,
    `- *Branch*: ${event.branch}`,
    `- *Status*: ${event.status}`,
    `- *Details*: ${event.details}`,
  ].join('\n');
}

/**
 * Build Slack message payload
 */
export function buildSlackPayload(config: SlackNotificationConfig, event: DeployEvent): Record<string, unknown> {
  const style = STATUS_STYLE[event.status];

  const payload: Record<string, unknown> = {
    username: config.username || 'Chain Deploy',
    icon_emoji: ':rocket:',
    text: formatDeployMessage(event),
    attachments: [
      {
        color: style.color,
        fallback: `Deploy ${event.status}: ${event.repository}`,
        title: `${style.emoji} Deploy ${event.status}`,
        text: event.details,
        fields: [
          { title: 'Repository', value: event.repository, short: true },
          { title: 'Branch', value: event.branch, short: true },
          { title: 'Status', value: event.status, short: true },
          { title: 'Time', value: event.timestamp, short: true },
        ],
        footer: 'webhook-chain-deploy',
      },
    ],
  };

  if (config.channel) {
    payload.channel = config.channel;
  }

  return payload;
}

/**
 * Build Discord message payload
 */
export function buildDiscordPayload(config: DiscordNotificationConfig, event: DeployEvent): Record<string, unknown> {
  const style = STATUS_STYLE[event.status];

  return {
    username: config.username || 'Chain Deploy',
    embeds: [
      {
        title: `${style.discordEmoji} Deploy ${event.status}`,
        description: event.details,
        color: parseInt(style.color.slice(1), 16),
        fields: [
          { name: 'Repository', value: event.repository, inline: true },
          { name: 'Branch', value: event.branch, inline: true },
        ],
        footer: { text: 'webhook-chain-deploy' },
        timestamp: event.timestamp,
      },
    ],
  };
}

export interface EmailMessage {
  from: string;
  to: string;
  subject: string;
  text: string;
}

const SMTPS_PORT = 465;
const SMTP_CONNECTION_TIMEOUT = 10000;

/**
 * Build the email for an event; null when the SMTP settings are incomplete
 */
export function buildEmailMessage(config: EmailNotificationConfig, event: DeployEvent): EmailMessage | null {
  const recipients = config.recipients ?? [];
  if (!config.smtpServer || !config.username || !config.password || recipients.length === 0) {
    return null;
  }
  return {
    from: config.senderEmail || config.username,
    to: recipients.join(', '),
    subject: `Deploy Event: ${event.status} on ${event.repository}`,
    text: formatDeployMessage(event),
  };
}

/**
 * Fans deploy events out to Slack, Discord, a generic webhook and email
 */
export class ChannelNotifier implements Notifier {
  constructor(
    private readonly config: NotificationsConfig | undefined,
    private readonly logger: Logger = silentLogger
  ) {}

  async notifyDeployEvent(repository: string, branch: string, status: DeployEventStatus, details: string): Promise<void> {
    const event: DeployEvent = { repository, branch, status, details, timestamp: new Date().toISOString() };
    this.logger.debug(`Deploy event: ${repository}@${branch} ${status}: ${details}`);

    const config = this.config;
    if (!config) return;

    const deliveries: Promise<void>[] = [];

    if (config.slack && shouldSend(config.slack, status)) {
      deliveries.push(this.post('Slack', config.slack.webhookUrl, buildSlackPayload(config.slack, event)));
    }
    if (config.discord && shouldSend(config.discord, status)) {
      deliveries.push(this.post('Discord', config.discord.webhookUrl, buildDiscordPayload(config.discord, event)));
    }
    if (config.webhook && shouldSend(config.webhook, status)) {
      deliveries.push(this.sendWebhook(config.webhook, event));
    }
    if (config.email && shouldSend(config.email, status)) {
      deliveries.push(this.sendEmail(config.email, event));
    }

    await Promise.allSettled(deliveries);
  }

  private sendWebhook(config: WebhookNotificationConfig, event: DeployEvent): Promise<void> {
    return this.post('Webhook', config.url, event, config.method || 'POST', config.headers);
  }

  private async sendEmail(config: EmailNotificationConfig, event: DeployEvent): Promise<void> {
    const message = buildEmailMessage(config, event);
    if (!message) {
      this.logger.warn('Email configuration is incomplete (smtpServer, username, password, recipients). Skipping email.');
      return;
    }

    const port = config.smtpPort ?? 587;
    const implicitTls = port === SMTPS_PORT;
    const useTls = config.useTls ?? true;
    const transport = nodemailer.createTransport({
      host: config.smtpServer,
      port,
      secure: implicitTls,
      requireTLS: !implicitTls && useTls,
      ignoreTLS: !implicitTls && !useTls,
      auth: { user: config.username, pass: config.password },
      connectionTimeout: SMTP_CONNECTION_TIMEOUT,
    });

    try {
      await transport.sendMail(message);
      this.logger.debug(`Email sent to ${message.to}`);
    } catch (error) {
      this.logger.warn(`Email notification error: ${toErrorMessage(error)}`);
    } finally {
      transport.close();
    }
  }

  private async post(
    channel: string,
    url: string,
    body: unknown,
    method: 'POST' | 'PUT' = 'POST',
    headers: Record<string, string> = {}
  ): Promise<void> {
    try {
      const response = await fetch(url, {
        method,
        headers: { 'Content-Type': 'application/json', ...headers },
        body: JSON.stringify(body),
      });

      if (!response.ok) {
        this.logger.warn(`${channel} notification failed: ${response.status}`);
      } else {
        this.logger.debug(`${channel} notification sent`);
      }
    } catch (error) {
      this.logger.warn(`${channel} notification error: ${toErrorMessage(error)}`);
    }
  }
}

function shouldSend(config: { onlyOnFailure?: boolean }, status: DeployEventStatus): boolean {
  return !config.onlyOnFailure || status === 'failed';
}
