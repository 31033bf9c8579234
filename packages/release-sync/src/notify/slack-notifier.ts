/**
 * Slack notifier.
 *
 * Posts plain-text status messages to a single channel or user with a bot
 * token. Delivery is best-effort: a failed post is logged once and dropped.
 */

import { WebClient } from '@slack/web-api';
import type { Logger } from 'pino';
import { NotificationError, errorMessage } from '../errors.js';
import type { Notifier } from './types.js';

export interface SlackNotifierOptions {
  /** Slack channel or user ID */
  recipient: string;
  /** Bot token; ignored when `slackClient` is given */
  token: string;
  slackClient?: WebClient;
}

export class SlackNotifier implements Notifier {
  private readonly recipient: string;
  private readonly slackClient: WebClient;
  private readonly logger: Logger;

  constructor(options: SlackNotifierOptions, logger: Logger) {
    this.recipient = options.recipient;
    this.slackClient =
      options.slackClient ??
      new WebClient(options.token, {
        retryConfig: { retries: 0 },
        rejectRateLimitedCalls: true,
      });
    this.logger = logger.child({ component: 'slack-notifier' });
  }

  async notify(text: string): Promise<void> {
    try {
      const result = await this.slackClient.chat.postMessage({
        channel: this.recipient,
        text,
      });

      if (!result.ok) {
        throw new Error(result.error ?? 'chat.postMessage returned ok=false');
      }

      this.logger.debug({ recipient: this.recipient, ts: result.ts }, 'Notification sent');
    } catch (err) {
      const error = new NotificationError(
        this.recipient,
        `Failed to send notification: ${errorMessage(err)}`,
        { cause: err }
      );
      this.logger.error({ recipient: this.recipient, error: error.message }, 'Notification failed');
    }
  }
}
