import { logger } from '../middleware/logging.js';
import { BroadcastSummary } from '../types/bot.js';
import { getErrorMessage } from '../utils/errorHandling.js';

export interface MessageSender {
  sendMessage(chatId: number, text: string): Promise<unknown>;
}

/**
 * Sends one message to many chats, one at a time with a fixed pause.
 * A failed recipient is counted and skipped.
 */
export class BroadcastService {
  constructor(
    private readonly sender: MessageSender,
    private readonly delayMs: number
  ) {}

  async broadcast(recipientIds: readonly number[], text: string): Promise<BroadcastSummary> {
    let succeeded = 0;
    let failed = 0;

    for (const [index, chatId] of recipientIds.entries()) {
      if (index > 0) {
        await this.pause();
      }

      try {
        await this.sender.sendMessage(chatId, text);
        succeeded++;
      } catch (error) {
        failed++;
        logger.warn('Failed to send broadcast', { chatId, error: getErrorMessage(error) });
      }
    }

    logger.info('Broadcast finished', { recipients: recipientIds.length, succeeded, failed });
    return { recipients: recipientIds.length, succeeded, failed };
  }

  private pause(): Promise<void> {
    if (this.delayMs <= 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => setTimeout(resolve, this.delayMs));
  }
}
