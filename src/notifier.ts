import type { Logger } from "pino";
import { Telegram } from "telegraf";

export interface AdminNotifier {
  notify(text: string): Promise<void>;
}

/** Sends admin alerts to a Telegram chat through the Bot API. */
export class TelegramAdminNotifier implements AdminNotifier {
  private readonly telegram: Telegram;

  constructor(
    token: string,
    private readonly chatId: string,
    private readonly logger?: Logger
  ) {
    this.telegram = new Telegram(token);
  }

  async notify(text: string): Promise<void> {
    await this.telegram.sendMessage(this.chatId, text);
    this.logger?.debug({ chat_id: this.chatId }, "admin notified");
  }
}

/** Used when no admin chat is configured: alerts only reach the log. */
export class LogAdminNotifier implements AdminNotifier {
  constructor(private readonly logger: Logger) {}

  async notify(text: string): Promise<void> {
    this.logger.warn({ alert: text }, "admin alert (no admin chat configured)");
  }
}
