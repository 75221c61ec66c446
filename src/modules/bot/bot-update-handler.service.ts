import { Injectable, Logger } from '@nestjs/common';
import { RatioCalculatorService } from '../ratio/ratio-calculator.service.js';
import { RatioPairsLoaderService } from '../ratio-pairs/ratio-pairs-loader.service.js';
import { escapeHtml } from '../monitoring/formatters/telegram-message.formatter.js';
import { TelegramBotApiService } from './telegram-bot-api.service.js';
import {
  CALLBACK,
  backKeyboard,
  formatBotError,
  formatHelp,
  formatPairsList,
  formatSimpleRatioReply,
  formatVolumeRatioReply,
  formatWelcome,
  mainKeyboard,
  pairSelectionKeyboard,
  volumeAnalysisKeyboard,
} from './formatters/bot-message.formatter.js';
import type {
  BotCallbackQuery,
  BotMessage,
  BotReply,
  BotUpdate,
} from './telegram-bot.types.js';

type BotCommand = 'start' | 'help' | 'pairs' | 'ratio';

const COMMANDS: readonly BotCommand[] = ['start', 'help', 'pairs', 'ratio'];

function isBotCommand(value: string): value is BotCommand {
  return COMMANDS.some((command) => command === value);
}

/** "/Ratio@SomeBot extra" → "ratio"; null for plain text or unknown commands. */
export function parseCommand(text: string): BotCommand | null {
  const token = text.trim().split(/\s+/)[0] ?? '';
  if (!token.startsWith('/')) return null;
  const name = (token.slice(1).split('@')[0] ?? '').toLowerCase();
  return isBotCommand(name) ? name : null;
}

/**
 * Routes bot commands and inline-button presses to the pair configuration
 * and the ratio calculator. Replies go back to the chat the update came from.
 */
@Injectable()
export class BotUpdateHandlerService {
  private readonly logger = new Logger(BotUpdateHandlerService.name);

  constructor(
    private readonly api: TelegramBotApiService,
    private readonly pairsLoader: RatioPairsLoaderService,
    private readonly calculator: RatioCalculatorService,
  ) {}

  async handle(update: BotUpdate): Promise<void> {
    if (update.message) {
      await this.handleMessage(update.message);
    } else if (update.callbackQuery) {
      await this.handleCallback(update.callbackQuery);
    }
  }

  private async handleMessage(message: BotMessage): Promise<void> {
    if (message.text === null) return;

    const command = parseCommand(message.text);
    this.logger.debug({
      message: 'Bot message received',
      module: 'bot',
      chatId: message.chatId,
      command,
    });
    await this.reply(message.chatId, this.commandReply(command));
  }

  private commandReply(command: BotCommand | null): BotReply {
    const pairs = this.pairsLoader.getPairs();
    switch (command) {
      case 'start':
        return { text: formatWelcome(), keyboard: mainKeyboard() };
      case 'help':
        return { text: formatHelp() };
      case 'pairs':
        return { text: formatPairsList(pairs) };
      case 'ratio':
        return { text: '\u{1F4CA} Select a ratio pair:', keyboard: pairSelectionKeyboard(pairs) };
      case null:
        return {
          text: 'Use /start to see available commands or click the buttons below:',
          keyboard: mainKeyboard(),
        };
    }
  }

  private async handleCallback(query: BotCallbackQuery): Promise<void> {
    await this.api.answerCallbackQuery(query.id);
    if (query.chatId === null || query.data === null) return;

    const chatId = query.chatId;
    const data = query.data;
    this.logger.debug({
      message: 'Bot button pressed',
      module: 'bot',
      chatId,
      data,
    });

    if (data.startsWith(CALLBACK.RATIO_PREFIX)) {
      await this.replyWithSimpleRatio(chatId, data.slice(CALLBACK.RATIO_PREFIX.length));
      return;
    }
    if (data.startsWith(CALLBACK.VOLUME_PREFIX)) {
      await this.replyWithVolumeRatio(chatId, data.slice(CALLBACK.VOLUME_PREFIX.length));
      return;
    }

    const pairs = this.pairsLoader.getPairs();
    switch (data) {
      case CALLBACK.MAIN_RATIOS:
      case CALLBACK.BACK_TO_PAIRS:
        await this.reply(chatId, {
          text: '\u{1F4CA} Select a ratio pair:',
          keyboard: pairSelectionKeyboard(pairs),
        });
        return;
      case CALLBACK.MAIN_PAIRS:
        await this.reply(chatId, { text: formatPairsList(pairs), keyboard: backKeyboard() });
        return;
      case CALLBACK.MAIN_MENU:
        await this.reply(chatId, { text: 'Main menu:', keyboard: mainKeyboard() });
        return;
      default:
        this.logger.warn({
          message: 'Unknown bot callback data',
          module: 'bot',
          data,
        });
    }
  }

  private async replyWithSimpleRatio(chatId: number, pairName: string): Promise<void> {
    const pair = this.pairsLoader.findPair(pairName);
    if (!pair) {
      await this.reply(chatId, { text: `Unknown pair: ${escapeHtml(pairName)}` });
      return;
    }

    await this.reply(chatId, { text: '\u{23F3} Calculating ratio...' });
    try {
      const ratio = await this.calculator.calculateSimpleRatio(
        pair.name,
        pair.symbolA,
        pair.symbolB,
      );
      await this.reply(chatId, {
        text: formatSimpleRatioReply(ratio),
        keyboard:
          pair.analysisVolume !== undefined
            ? volumeAnalysisKeyboard(pair.name, pair.analysisVolume)
            : backKeyboard(),
      });
    } catch (error) {
      this.logger.warn({
        message: 'Bot ratio calculation failed',
        module: 'bot',
        pairName: pair.name,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.reply(chatId, { text: formatBotError('calculating ratio', error) });
    }
  }

  private async replyWithVolumeRatio(chatId: number, pairName: string): Promise<void> {
    const pair = this.pairsLoader.findPair(pairName);
    if (!pair) {
      await this.reply(chatId, { text: `Unknown pair: ${escapeHtml(pairName)}` });
      return;
    }
    if (pair.analysisVolume === undefined) {
      await this.reply(chatId, {
        text: `Pair ${escapeHtml(pair.name)} has no analysisVolume configured`,
        keyboard: backKeyboard(),
      });
      return;
    }

    await this.reply(chatId, { text: '\u{23F3} Analyzing order book...' });
    try {
      const ratio = await this.calculator.calculateVolumeRatio(
        pair.name,
        pair.symbolA,
        pair.symbolB,
        pair.analysisVolume,
      );
      await this.reply(chatId, {
        text: formatVolumeRatioReply(ratio),
        keyboard: backKeyboard(),
      });
    } catch (error) {
      this.logger.warn({
        message: 'Bot volume analysis failed',
        module: 'bot',
        pairName: pair.name,
        error: error instanceof Error ? error.message : String(error),
      });
      await this.reply(chatId, { text: formatBotError('analyzing volume', error) });
    }
  }

  private async reply(chatId: number, reply: BotReply): Promise<void> {
    await this.api.sendMessage(chatId, reply.text, reply.keyboard);
  }
}
