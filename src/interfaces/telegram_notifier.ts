import TelegramBot from 'node-telegram-bot-api';
import type { NotifySendFn, NotifyTarget } from '../services/operator-notifier.js';

/** Minimum ms delay between outbound alerts. */
const RATE_LIMIT_MS = 1500;

/**
 * Thin Bot API sender for operator alerts. It never polls: the bot only
 * writes to the configured chat, it does not read commands.
 */
export class TelegramNotifier {
  readonly #bot: TelegramBot;
  #lastMessageAt: number = 0;

  /**
   * @param token - Bot token from @BotFather (TELEGRAM_BOT_TOKEN).
   */
  constructor(token: string, bot?: TelegramBot) {
    this.#bot = bot ?? new TelegramBot(token, { polling: false });
  }

  async sendText(chatId: string | number, text: string): Promise<void> {
    await this.#applyRateLimit();
    await this.#bot.sendMessage(chatId, text);
  }

  /** Adapter for `OperatorNotifier`. */
  readonly send: NotifySendFn = async (target: NotifyTarget, text: string): Promise<void> => {
    await this.sendText(target.chatId, text);
  };

  async #applyRateLimit(): Promise<void> {
    const elapsed = Date.now() - this.#lastMessageAt;
    if (elapsed < RATE_LIMIT_MS) {
      await new Promise<void>((resolve) =>
        setTimeout(resolve, RATE_LIMIT_MS - elapsed),
      );
    }
    this.#lastMessageAt = Date.now();
  }
}
