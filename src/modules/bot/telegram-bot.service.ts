import {
  Injectable,
  Logger,
  type OnApplicationBootstrap,
  type OnApplicationShutdown,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { ConfigValidationError } from '../../common/errors/index.js';
import { TelegramBotApiService } from './telegram-bot-api.service.js';
import { BotUpdateHandlerService } from './bot-update-handler.service.js';

const DEFAULT_POLL_TIMEOUT_SECS = 30;
const POLL_RETRY_DELAY_MS = 5000;

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
function pause(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal.removeEventListener('abort', done);
      resolve();
    }
    signal.addEventListener('abort', done, { once: true });
  });
}

/**
 * Interactive bot: long-polls getUpdates and hands each update to the
 * handler in order. Off unless TELEGRAM_BOT_ENABLED=true.
 */
@Injectable()
export class TelegramBotService
  implements OnApplicationBootstrap, OnApplicationShutdown
{
  private readonly logger = new Logger(TelegramBotService.name);
  private readonly enabled: boolean;
  private readonly pollTimeoutSecs: number;
  private offset = 0;
  private abortController: AbortController | null = null;
  private pollLoop: Promise<void> | null = null;

  constructor(
    configService: ConfigService,
    private readonly api: TelegramBotApiService,
    private readonly handler: BotUpdateHandlerService,
  ) {
    this.enabled =
      String(configService.get<string | boolean>('TELEGRAM_BOT_ENABLED', 'false'))
        .trim()
        .toLowerCase() === 'true';
    const pollTimeout = Number(
      configService.get<string | number>(
        'TELEGRAM_POLL_TIMEOUT_SECS',
        DEFAULT_POLL_TIMEOUT_SECS,
      ),
    );
    if (!Number.isInteger(pollTimeout) || pollTimeout < 0) {
      throw new ConfigValidationError(
        'Telegram bot config validation failed with 1 error(s)',
        [`TELEGRAM_POLL_TIMEOUT_SECS must be an integer >= 0 (got "${String(pollTimeout)}")`],
      );
    }
    this.pollTimeoutSecs = pollTimeout;
  }

  onApplicationBootstrap(): void {
    if (!this.enabled) {
      this.logger.log({
        message: 'Telegram bot disabled (TELEGRAM_BOT_ENABLED is not true)',
        module: 'bot',
      });
      return;
    }
    if (!this.api.isConfigured()) {
      throw new ConfigValidationError(
        'Telegram bot config validation failed with 1 error(s)',
        ['TELEGRAM_BOT_TOKEN is required when TELEGRAM_BOT_ENABLED=true'],
      );
    }

    const controller = new AbortController();
    this.abortController = controller;
    this.pollLoop = this.runPollLoop(controller.signal);
    this.logger.log({
      message: 'Telegram bot started',
      module: 'bot',
      pollTimeoutSecs: this.pollTimeoutSecs,
    });
  }

  async onApplicationShutdown(): Promise<void> {
    if (!this.abortController) return;
    this.abortController.abort();
    await this.pollLoop;
    this.abortController = null;
    this.pollLoop = null;
    this.logger.log({ message: 'Telegram bot stopped', module: 'bot' });
  }

  isRunning(): boolean {
    return this.abortController !== null;
  }

  /**
   * Fetches one batch of updates and dispatches them in order. The offset
   * moves past each update before it is handled, so a failing update is
   * never fetched again.
   */
  async pollOnce(signal?: AbortSignal): Promise<number> {
    const updates = await this.api.getUpdates(
      this.offset,
      this.pollTimeoutSecs,
      signal,
    );
    for (const update of updates) {
      this.offset = update.updateId + 1;
      try {
        await this.handler.handle(update);
      } catch (error) {
        this.logger.error({
          message: 'Bot update handling failed',
          module: 'bot',
          updateId: update.updateId,
          error: errorMessage(error),
        });
      }
    }
    return updates.length;
  }

  private async runPollLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.pollOnce(signal);
      } catch (error) {
        if (signal.aborted) break;
        this.logger.warn({
          message: 'Telegram getUpdates failed',
          module: 'bot',
          error: errorMessage(error),
          retryInMs: POLL_RETRY_DELAY_MS,
        });
        await pause(POLL_RETRY_DELAY_MS, signal);
      }
    }
  }
}
