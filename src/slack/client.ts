import { IncomingWebhook } from '@slack/webhook';
import { logger } from '../logger.js';
import { SlackError, toError } from '../errors.js';
import { withTimeout } from '../utils.js';

export interface Notifier {
  post(text: string): Promise<void>;
}

export class SlackClient implements Notifier {
  private webhook: IncomingWebhook;

  constructor(webhookUrl: string, private readonly timeoutMs = 10_000) {
    this.webhook = new IncomingWebhook(webhookUrl);
  }

  async post(text: string): Promise<void> {
    try {
      await withTimeout(this.webhook.send({ text }), this.timeoutMs, 'slack.send', 'slack');
    } catch (err) {
      throw new SlackError('Failed to post to Slack webhook', {
        operation: 'post',
        context: { length: text.length },
        cause: toError(err),
      });
    }
    logger.info('Posted message to Slack');
  }
}
