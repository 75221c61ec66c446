import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import type { INotifier } from '../../common/interfaces/index.js';
import {
  NotificationError,
  NOTIFICATION_ERROR_CODES,
} from '../../common/errors/index.js';
import { formatConnectionTest } from './formatters/telegram-message.formatter.js';

const CHANNEL = 'telegram';

interface TelegramResponseBody {
  ok?: boolean;
  description?: string;
  parameters?: { retry_after?: number };
}

function isTelegramBody(value: unknown): value is TelegramResponseBody {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Telegram Bot API notifier. One HTTP attempt per `send`; every failure is
 * thrown as a NotificationError for the caller to log.
 */
@Injectable()
export class TelegramNotifierService implements INotifier, OnModuleInit {
  private readonly logger = new Logger(TelegramNotifierService.name);

  private readonly token: string;
  private readonly chatId: string;
  private readonly apiUrl: string;
  private readonly sendTimeoutMs: number;

  constructor(private readonly configService: ConfigService) {
    this.token = this.configService.get<string>('TELEGRAM_BOT_TOKEN', '');
    this.chatId = this.configService.get<string>('TELEGRAM_CHAT_ID', '');
    this.apiUrl = this.configService.get<string>(
      'TELEGRAM_API_URL',
      'https://api.telegram.org',
    );
    this.sendTimeoutMs = Number(
      this.configService.get<string | number>('TELEGRAM_SEND_TIMEOUT_MS', 5000),
    );
  }

  onModuleInit(): void {
    if (!this.isConfigured()) {
      this.logger.warn({
        message:
          'Telegram notifier not configured: missing TELEGRAM_BOT_TOKEN or TELEGRAM_CHAT_ID',
        module: 'monitoring',
      });
    }
  }

  isConfigured(): boolean {
    return this.token !== '' && this.chatId !== '';
  }

  async send(text: string): Promise<void> {
    if (!this.isConfigured()) {
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.NOT_CONFIGURED,
        'Telegram notifier not configured',
        CHANNEL,
      );
    }

    let response: Response;
    let body: unknown;
    try {
      response = await fetch(`${this.apiUrl}/bot${this.token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({
          chat_id: this.chatId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
        signal: AbortSignal.timeout(this.sendTimeoutMs),
      });
      body = await response.json();
    } catch (error) {
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.SEND_FAILED,
        `Telegram send failed: ${error instanceof Error ? error.message : String(error)}`,
        CHANNEL,
      );
    }

    const parsed = isTelegramBody(body) ? body : {};

    if (response.status === 429) {
      const retryAfter = parsed.parameters?.retry_after;
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.RATE_LIMITED,
        `Telegram rate limited${retryAfter ? ` (retry after ${retryAfter}s)` : ''}`,
        CHANNEL,
        retryAfter,
        { status: 429 },
      );
    }

    if (!response.ok || parsed.ok !== true) {
      throw new NotificationError(
        NOTIFICATION_ERROR_CODES.SEND_FAILED,
        `Telegram send failed: HTTP ${response.status}${parsed.description ? ` (${parsed.description})` : ''}`,
        CHANNEL,
        undefined,
        { status: response.status },
      );
    }
  }

  async testConnection(): Promise<void> {
    await this.send(formatConnectionTest(new Date()));
    this.logger.log({
      message: 'Telegram connection verified',
      module: 'monitoring',
    });
  }
}
