import type { EventRecord } from "@/types";
import type { HttpClient } from "@/lib/scrapers/fetchHtml";
import type { Notifier } from "./types";
import { formatMessage } from "./formatMessage";

const TELEGRAM_API = "https://api.telegram.org";

export interface TelegramOptions {
  token: string;
  chatId: string;
}

/** Bot API sendMessage through the run's shared HTTP client. A non-2xx answer rejects. */
export function createTelegramNotifier(client: HttpClient, options: TelegramOptions): Notifier {
  const url = `${TELEGRAM_API}/bot${options.token}/sendMessage`;
  return {
    async send(event: EventRecord): Promise<void> {
      try {
        await client.postJson(url, {
          chat_id: options.chatId,
          text: formatMessage(event),
          disable_web_page_preview: true,
        });
      } catch (e) {
        // the bot token is part of the request URL and must not reach the logs
        const msg = e instanceof Error ? e.message : String(e);
        throw new Error(`Telegram sendMessage failed: ${msg.split(options.token).join("<token>")}`);
      }
    },
  };
}

/** Prints messages instead of sending them (DRY_RUN). */
export function createConsoleNotifier(): Notifier {
  return {
    async send(event: EventRecord): Promise<void> {
      console.info(`[deliver] (dry run)\n${formatMessage(event)}\n`);
    },
  };
}
