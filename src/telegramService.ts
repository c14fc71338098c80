import TelegramBot from "node-telegram-bot-api";
import { DeliveryError, errorMessage } from "./errors";
import { logger } from "./logger";
import type { MessagePayload } from "./types";

export interface DeliveryChannel {
  notify(subscriberId: string, payload: MessagePayload): Promise<void>;
}

/** The part of the Bot API this service calls. */
export interface TelegramApi {
  sendMessage(
    chatId: string,
    text: string,
    options?: TelegramBot.SendMessageOptions
  ): Promise<unknown>;
  sendPhoto(
    chatId: string,
    photo: string,
    options?: TelegramBot.SendPhotoOptions
  ): Promise<unknown>;
}

const log = logger.child("telegram");

const UNREACHABLE_DESCRIPTIONS = [
  "chat not found",
  "bot was blocked",
  "user is deactivated",
  "bot can't initiate conversation",
];

function readStatus(error: unknown): number | undefined {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const response: unknown = Reflect.get(error, "response");
  if (typeof response !== "object" || response === null) {
    return undefined;
  }
  const statusCode: unknown = Reflect.get(response, "statusCode");
  return typeof statusCode === "number" ? statusCode : undefined;
}

/** 403 and "chat not found" style answers mean the recipient is gone; everything else may pass later. */
export function classifyDeliveryError(subscriberId: string, error: unknown): DeliveryError {
  const message = errorMessage(error);
  const status = readStatus(error);
  const unreachable =
    status === 403 ||
    UNREACHABLE_DESCRIPTIONS.some((text) => message.toLowerCase().includes(text));

  return new DeliveryError(
    unreachable ? "RecipientUnreachable" : "TransientFailure",
    `Delivery to ${subscriberId} failed: ${message}`,
    { subscriberId, status }
  );
}

export class TelegramService implements DeliveryChannel {
  private readonly bot: TelegramApi;

  constructor(botTokenOrApi: string | TelegramApi) {
    if (typeof botTokenOrApi === "string") {
      if (!botTokenOrApi) {
        throw new Error("TELEGRAM_BOT_TOKEN is required");
      }
      this.bot = new TelegramBot(botTokenOrApi, { polling: false });
    } else {
      this.bot = botTokenOrApi;
    }
    log.info("TelegramService initialized");
  }

  /**
   * Sends a rendered message or an image with caption. Failures are rethrown
   * as DeliveryError so the caller can decide per subscriber.
   */
  async notify(subscriberId: string, payload: MessagePayload): Promise<void> {
    try {
      if (payload.kind === "text") {
        await this.bot.sendMessage(subscriberId, payload.text, {
          parse_mode: "HTML",
          disable_web_page_preview: true,
        });
      } else {
        await this.bot.sendPhoto(subscriberId, payload.url, { caption: payload.caption });
      }
      log.debug(`Delivered ${payload.kind} message to ${subscriberId}`);
    } catch (error) {
      throw classifyDeliveryError(subscriberId, error);
    }
  }
}

/** Used when no bot token is configured: messages are logged and dropped. */
export const disabledDelivery: DeliveryChannel = {
  async notify(subscriberId, payload) {
    log.warn(`Telegram service not configured, dropping ${payload.kind} message for ${subscriberId}`);
  },
};
