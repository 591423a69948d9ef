import type { HuntResult } from "@port-hunter/shared";
import type { Logger } from "../logger.js";
import { formatRange } from "./address.js";

const TELEGRAM_API_URL = "https://api.telegram.org";
const SEND_TIMEOUT_MS = 10000;

/**
 * Outbound alert channel. `send` never rejects; delivery failures are logged.
 */
export interface Notifier {
  send(text: string): Promise<void>;
}

export interface TelegramNotifierOptions {
  botToken: string;
  chatId: string;
  logger: Logger;
  fetch?: typeof fetch;
}

/**
 * Sends messages through the Telegram Bot API
 */
export class TelegramNotifier implements Notifier {
  private url: string;
  private chatId: string;
  private logger: Logger;
  private fetchImpl: typeof fetch;

  constructor(options: TelegramNotifierOptions) {
    this.url = `${TELEGRAM_API_URL}/bot${options.botToken}/sendMessage`;
    this.chatId = options.chatId;
    this.logger = options.logger;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async send(text: string): Promise<void> {
    try {
      const response = await this.fetchImpl(this.url, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
        },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: "HTML",
        }),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      });

      if (!response.ok) {
        this.logger.warn(
          { status: response.status },
          `Failed to send Telegram notification: ${response.status} ${response.statusText}`
        );
      }
    } catch (err) {
      this.logger.warn({ err }, "Failed to send Telegram notification");
    }
  }
}

class LogOnlyNotifier implements Notifier {
  private logger: Logger;

  constructor(logger: Logger) {
    this.logger = logger;
  }

  async send(text: string): Promise<void> {
    this.logger.debug({ text }, "Telegram not configured, skipping notification");
  }
}

/**
 * Telegram when both bot token and chat id are configured, otherwise a no-op
 */
export function createNotifier(
  telegram: { botToken?: string; chatId?: string },
  logger: Logger
): Notifier {
  if (telegram.botToken && telegram.chatId) {
    return new TelegramNotifier({ botToken: telegram.botToken, chatId: telegram.chatId, logger });
  }
  return new LogOnlyNotifier(logger);
}

/**
 * Message for a terminal hunt outcome, or null when nothing should be sent
 */
export function formatHuntNotification(result: HuntResult): string | null {
  switch (result.outcome) {
    case "matched": {
      const lines = result.retained.map(
        (port) => `✨ Found IP <b>${port.address}</b> (range ${formatRange(port.range)}, port ${port.portId})`
      );
      if (result.retained.length > 1) {
        lines.push(`⚠️ ${result.retained.length} ports matched at the same time and were all kept`);
      }
      return lines.join("\n");
    }
    case "exhausted":
      return `❌ No matching IP after ${result.launched} attempts`;
    case "deadline":
      return `❌ No matching IP before the hunt deadline (${result.launched} attempts)`;
    case "shutdown":
      return null;
  }
}
