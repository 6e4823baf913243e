import { Api } from "grammy";
import type { Notifier } from "./hedging/types.js";

/**
 * Pushes plain-text status messages to one Telegram chat through the Bot API.
 * Send failures propagate to the caller.
 */
export class TelegramNotifier implements Notifier {
  private readonly api: Api;

  constructor(
    botToken: string,
    private readonly chatId: string
  ) {
    this.api = new Api(botToken);
  }

  async push(text: string): Promise<void> {
    await this.api.sendMessage(this.chatId, text);
  }
}

/** Stand-in used when Telegram is not configured: prints the message instead. */
export class ConsoleNotifier implements Notifier {
  async push(text: string): Promise<void> {
    console.log(`[notify]\n${text}`);
  }
}

export function createNotifier(botToken: string, chatId: string): Notifier {
  if (!botToken || !chatId) {
    console.log("[notify] No TELEGRAM_BOT_TOKEN/TELEGRAM_CHAT_ID, printing messages to stdout");
    return new ConsoleNotifier();
  }
  return new TelegramNotifier(botToken, chatId);
}
