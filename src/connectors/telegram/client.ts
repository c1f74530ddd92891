import { createNoopLogger, errorMessage, type Logger } from "../../shared/logger.js";
import {
  TELEGRAM_MAX_MESSAGE_LENGTH,
  stripMarkup,
  truncateMessage
} from "../../modules/notification/formatter.js";
import type { DeliverySink } from "../../modules/notification/types.js";
import { assertPositiveInt, stripTrailingSlash } from "../shared/http.js";

export interface TelegramClientOptions {
  botToken: string;
  chatId: string;
  requestTimeoutMs: number;
  baseUrl?: string;
  maxMessageLength?: number;
  fetchImpl?: typeof fetch;
  logger?: Logger;
}

interface SendMessagePayload {
  chat_id: number | string;
  text: string;
  parse_mode?: "Markdown";
}

type SendResult = { ok: true } | { ok: false; status: number; description: string };

/** Numeric ids go out as numbers; `@channel` usernames stay strings. */
export function normalizeChatId(chatId: string): number | string {
  const trimmed = chatId.trim();
  return /^-?\d+$/.test(trimmed) ? Number(trimmed) : trimmed;
}

function isParseRejection(description: string): boolean {
  const normalized = description.toLowerCase();
  return normalized.includes("parse") || normalized.includes("markdown");
}

async function readErrorDescription(response: Response): Promise<string> {
  const contentType = response.headers.get("content-type") ?? "";
  if (contentType.startsWith("application/json")) {
    const parsed: unknown = await response.json();
    if (parsed && typeof parsed === "object" && "description" in parsed) {
      return String(parsed.description);
    }
    return "Bad Request";
  }
  const body = await response.text();
  return body || "Bad Request";
}

export class TelegramClient implements DeliverySink {
  private readonly endpoint: string;
  private readonly chatId: number | string;
  private readonly requestTimeoutMs: number;
  private readonly maxMessageLength: number;
  private readonly fetchImpl: typeof fetch;
  private readonly logger: Logger;

  constructor(options: TelegramClientOptions) {
    if (!options.botToken || options.botToken.trim() === "") {
      throw new Error("TelegramClient requires a non-empty botToken");
    }
    if (!options.chatId || options.chatId.trim() === "") {
      throw new Error("TelegramClient requires a non-empty chatId");
    }
    assertPositiveInt(options.requestTimeoutMs, "requestTimeoutMs");

    const baseUrl = stripTrailingSlash((options.baseUrl ?? "https://api.telegram.org").trim());
    this.endpoint = `${baseUrl}/bot${options.botToken.trim()}/sendMessage`;
    this.chatId = normalizeChatId(options.chatId);
    this.requestTimeoutMs = options.requestTimeoutMs;
    this.maxMessageLength = options.maxMessageLength ?? TELEGRAM_MAX_MESSAGE_LENGTH;
    this.fetchImpl = options.fetchImpl ?? fetch;
    this.logger = options.logger ?? createNoopLogger();
  }

  async deliver(message: string): Promise<boolean> {
    let text = message;
    if (text.length > this.maxMessageLength) {
      text = truncateMessage(text, this.maxMessageLength);
      this.logger.warn("message truncated to transport limit", {
        max_length: this.maxMessageLength
      });
    }

    try {
      let result = await this.send({ chat_id: this.chatId, text, parse_mode: "Markdown" });

      if (!result.ok && result.status === 400) {
        this.logger.error("telegram rejected message", { description: result.description });

        if (!isParseRejection(result.description)) {
          return false;
        }
        this.logger.warn("retrying without markdown formatting");
        result = await this.send({ chat_id: this.chatId, text: stripMarkup(text) });
      }

      if (!result.ok) {
        this.logger.error("telegram delivery failed", {
          status: result.status,
          body: result.description
        });
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error("telegram delivery failed", { error: errorMessage(error) });
      return false;
    }
  }

  /** The timeout covers both the request and reading an error body. */
  private async send(payload: SendMessagePayload): Promise<SendResult> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => {
      controller.abort();
    }, this.requestTimeoutMs);

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: {
          "content-type": "application/json",
          "user-agent": "coastal-storm-watch/1.0"
        },
        body: JSON.stringify(payload),
        signal: controller.signal
      });
      if (response.ok) {
        return { ok: true };
      }
      const description =
        response.status === 400 ? await readErrorDescription(response) : await response.text();
      return { ok: false, status: response.status, description };
    } catch (error) {
      if (error instanceof Error && error.name === "AbortError") {
        throw new Error(`Telegram request timed out after ${this.requestTimeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeoutId);
    }
  }
}
