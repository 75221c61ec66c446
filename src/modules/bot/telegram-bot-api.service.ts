import { Injectable } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  NotificationError,
  NOTIFICATION_ERROR_CODES,
} from '../../common/errors/index.js';
import {
  parseUpdates,
  type BotUpdate,
  type InlineKeyboardMarkup,
} from './telegram-bot.types.js';

const CHANNEL = 'telegram';
/** Slack on top of the long-poll timeout before the request is abandoned. */
const POLL_REQUEST_GRACE_MS = 10_000;

interface BotApiResponse {
  ok?: boolean;
  result?: unknown;
  description?: string;
  parameters?: { retry_after?: number };
}

function isBotApiResponse(value: unknown): value is BotApiResponse {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Thin client for the Bot API methods the interactive bot needs:
 * getUpdates (long polling), sendMessage with inline keyboards and
 * answerCallbackQuery.
 */
@Injectable()
export class TelegramBotApiService {
  private readonly token: string;
  private readonly apiUrl: string;
  private readonly requestTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.token = this.configService.get<string>('TELEGRAM_BOT_TOKEN', '');
    this.apiUrl = this.configService.get<string>(
      'TELEGRAM_API_URL',
      'https://api.telegram.org',
    );
    this.requestTimeoutMs = Number(
      this.configService.get<string | number>('TELEGRAM_SEND_TIMEOUT_MS', 5000),
    );
  }

  isConfigured(): boolean {
    return this.token !== '';
  }

  async getUpdates(
    offset: number,
    timeoutSecs: number,
    signal?: AbortSignal,
  ): Promise<BotUpdate[]> {
    const timeout = AbortSignal.timeout(timeoutSecs * 1000 + POLL_REQUEST_GRACE_MS);
    const result = await this.call(
      'getUpdates',
      {
        offset,
        timeout: timeoutSecs,
        allowed_updates: ['message', 'callback_query'],
      },
      signal ? AbortSignal.any([signal, timeout]) : timeout,
    );
    return parseUpdates(result);
  }

  async sendMessage(
    chatId: number,
    text: string,
    keyboard?: InlineKeyboardMarkup,
  ): Promise<void> {
    await this.call(
      'sendMessage',
      {
        chat_id: chatId,
        text,
        parse_mode: 'HTML',
        disable_web_page_preview: true,
        ...(keyboard ? { reply_markup: keyboard } : {}),
      },
      AbortSignal.timeout(this.requestTimeoutMs),
    );
  }

  async answerCallbackQuery(callbackQueryId: string): Promise<void> {
    await this.call(
      'answerCallbackQuery',
      { callback_query_id: callbackQueryId },
      AbortSignal.timeout(this.requestTimeoutMs),
    );
  }

  private async call(
    method: string,
    payload: Record<string, unknown>,
    signal: AbortSignal,
  ): Promise<unknown> {
    if (!this.isConfigured()) {
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.NOT_CONFIGURED,
        'Telegram bot not configured',
        CHANNEL,
      );
    }

    let response: Response;
    let body: unknown;
    try {
      response = await fetch(`${this.apiUrl}/bot${this.token}/${method}`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify(payload),
        signal,
      });
      body = await response.json();
    } catch (error) {
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.SEND_FAILED,
        `Telegram ${method} failed: ${error instanceof Error ? error.message : String(error)}`,
        CHANNEL,
      );
    }

    const parsed = isBotApiResponse(body) ? body : {};

    if (response.status === 429) {
      const retryAfter = parsed.parameters?.retry_after;
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.RATE_LIMITED,
        `Telegram ${method} rate limited${retryAfter ? ` (retry after ${retryAfter}s)` : ''}`,
        CHANNEL,
        retryAfter,
        { status: 429, method },
      );
    }

    if (!response.ok || parsed.ok !== true) {
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.SEND_FAILED,
        `Telegram ${method} failed: HTTP ${response.status}${parsed.description ? ` (${parsed.description})` : ''}`,
        CHANNEL,
        undefined,
        { status: response.status, method },
      );
    }

    return parsed.result;
  }
}
