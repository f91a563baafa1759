import { WebhookClient } from 'discord.js';
import type { EmbedBuilder, WebhookClientOptions } from 'discord.js';
import { NotifyError, describeError } from '../errors.js';
import { createAlertEmbed, describeAlert } from '../utils/embed.js';
import { createLogger } from '../utils/logger.js';
import { withTimeout } from '../utils/timeout.js';
import type { Alert, Config } from '../types.js';

export type NotifyResult = { ok: true } | { ok: false; error: NotifyError };

export interface Notifier {
  readonly name: string;
  notify(alert: Alert): Promise<NotifyResult>;
}

export interface WebhookMessage {
  username?: string;
  embeds: EmbedBuilder[];
}

/** The slice of discord.js `WebhookClient` the notifier relies on. */
export interface WebhookSender {
  send(message: WebhookMessage): Promise<unknown>;
  destroy?(): void;
}

const logger = createLogger('Notifier');

export class DiscordWebhookNotifier implements Notifier {
  readonly name = 'discord';
  private sender: WebhookSender;
  private timeoutMs: number;

  constructor(sender: WebhookSender, timeoutMs: number) {
    this.sender = sender;
    this.timeoutMs = timeoutMs;
  }

  /** One POST per alert: the REST layer's own retries are switched off. */
  static fromUrl(url: string, timeoutMs: number, options: WebhookClientOptions = {}): DiscordWebhookNotifier {
    const client = new WebhookClient({ url }, { ...options, rest: { ...options.rest, retries: 0 } });
    return new DiscordWebhookNotifier(client, timeoutMs);
  }

  async notify(alert: Alert): Promise<NotifyResult> {
    const itemId = alertItemId(alert);
    try {
      const embed = createAlertEmbed(alert);
      await withTimeout(
        this.sender.send({ username: 'Price Monitor', embeds: [embed] }),
        this.timeoutMs,
        `Webhook delivery for ${itemId}`
      );
      logger.info(`Sent ${alert.type} alert: ${describeAlert(alert)}`);
      return { ok: true };
    } catch (error) {
      return {
        ok: false,
        error: new NotifyError(`Failed to deliver alert for ${itemId}: ${describeError(error)}`, {
          itemId,
          cause: error,
        }),
      };
    }
  }

  close(): void {
    this.sender.destroy?.();
  }
}

/** Emits the change to the log; used when no webhook is configured. */
export class LogNotifier implements Notifier {
  readonly name = 'log';

  async notify(alert: Alert): Promise<NotifyResult> {
    if (alert.type === 'error') {
      logger.error(`ALERT ${describeAlert(alert)}`);
    } else {
      logger.info(`ALERT ${describeAlert(alert)}`);
    }
    return { ok: true };
  }
}

export function alertItemId(alert: Alert): string {
  switch (alert.type) {
    case 'change':
      return alert.event.itemId;
    case 'targetRange':
      return alert.hit.itemId;
    case 'error':
      return alert.report.itemId;
  }
}

export function createNotifier(config: Config['notifier']): Notifier & { close?(): void } {
  if (config.discordWebhookUrl) {
    return DiscordWebhookNotifier.fromUrl(config.discordWebhookUrl, config.timeoutMs);
  }
  logger.warn('DISCORD_WEBHOOK_URL not set - alerts will only be logged');
  return new LogNotifier();
}
