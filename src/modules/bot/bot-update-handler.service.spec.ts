import { describe, it, expect, vi, beforeEach } from 'vitest';
import { Logger } from '@nestjs/common';
import {
  BotUpdateHandlerService,
  parseCommand,
} from './bot-update-handler.service.js';
import type { TelegramBotApiService } from './telegram-bot-api.service.js';
import type { RatioCalculatorService } from '../ratio/ratio-calculator.service.js';
import type { RatioPairsLoaderService } from '../ratio-pairs/ratio-pairs-loader.service.js';
import {
  backKeyboard,
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
  MonitoredPair,
  SimpleRatio,
  VolumeRatio,
} from '../../common/types/index.js';

vi.spyOn(Logger.prototype, 'debug').mockImplementation(() => {});
vi.spyOn(Logger.prototype, 'warn').mockImplementation(() => {});

const CHAT = 42;
const BTC_ETH: MonitoredPair = {
  name: 'BTC-ETH',
  symbolA: 'BTCUSDT',
  symbolB: 'ETHUSDT',
  analysisVolume: 1,
};
const SOL_BNB: MonitoredPair = { name: 'SOL-BNB', symbolA: 'SOLUSDT', symbolB: 'BNBUSDT' };
const PAIRS = [BTC_ETH, SOL_BNB];

const simpleRatio: SimpleRatio = {
  pairName: 'BTC-ETH',
  symbolA: 'BTCUSDT',
  symbolB: 'ETHUSDT',
  priceA: 50000,
  priceB: 2500,
  ratio: 20,
  timestamp: new Date('2026-03-01T12:00:00.000Z'),
};

const volumeRatio: VolumeRatio = {
  pairName: 'BTC-ETH',
  symbolA: 'BTCUSDT',
  symbolB: 'ETHUSDT',
  volume: 1,
  effectivePriceA: 50005,
  effectivePriceB: 2500,
  slippageA: 0.01,
  slippageB: 0,
  ratio: 20.002,
  timestamp: new Date('2026-03-01T12:00:00.000Z'),
};

describe('parseCommand', () => {
  it('should recognise known commands case-insensitively', () => {
    expect(parseCommand('/start')).toBe('start');
    expect(parseCommand('  /Ratio now')).toBe('ratio');
  });

  it('should strip a bot username suffix', () => {
    expect(parseCommand('/pairs@ratio_monitor_bot')).toBe('pairs');
  });

  it('should return null for plain text and unknown commands', () => {
    expect(parseCommand('hello')).toBeNull();
    expect(parseCommand('/trade')).toBeNull();
  });
});

describe('BotUpdateHandlerService', () => {
  let handler: BotUpdateHandlerService;
  let api: {
    sendMessage: ReturnType<typeof vi.fn>;
    answerCallbackQuery: ReturnType<typeof vi.fn>;
  };
  let calculator: {
    calculateSimpleRatio: ReturnType<typeof vi.fn>;
    calculateVolumeRatio: ReturnType<typeof vi.fn>;
  };

  function press(data: string, chatId: number | null = CHAT): Promise<void> {
    return handler.handle({
      updateId: 1,
      callbackQuery: { id: 'cb-1', data, chatId },
    });
  }

  function say(text: string | null): Promise<void> {
    return handler.handle({ updateId: 1, message: { chatId: CHAT, text } });
  }

  beforeEach(() => {
    api = {
      sendMessage: vi.fn().mockResolvedValue(undefined),
      answerCallbackQuery: vi.fn().mockResolvedValue(undefined),
    };
    calculator = {
      calculateSimpleRatio: vi.fn().mockResolvedValue(simpleRatio),
      calculateVolumeRatio: vi.fn().mockResolvedValue(volumeRatio),
    };
    const pairsLoader = {
      getPairs: vi.fn(() => PAIRS),
      findPair: vi.fn((name: string) => PAIRS.find((p) => p.name === name)),
    };
    handler = new BotUpdateHandlerService(
      api as unknown as TelegramBotApiService,
      pairsLoader as unknown as RatioPairsLoaderService,
      calculator as unknown as RatioCalculatorService,
    );
  });

  describe('commands', () => {
    it('should greet on /start with the main menu', async () => {
      await say('/start');

      expect(api.sendMessage).toHaveBeenCalledWith(CHAT, formatWelcome(), mainKeyboard());
    });

    it('should show help on /help', async () => {
      await say('/help');

      expect(api.sendMessage).toHaveBeenCalledWith(CHAT, formatHelp(), undefined);
    });

    it('should list configured pairs on /pairs', async () => {
      await say('/pairs');

      expect(api.sendMessage).toHaveBeenCalledWith(CHAT, formatPairsList(PAIRS), undefined);
    });

    it('should offer pair buttons on /ratio', async () => {
      await say('/ratio');

      expect(api.sendMessage).toHaveBeenCalledWith(
        CHAT,
        '\u{1F4CA} Select a ratio pair:',
        pairSelectionKeyboard(PAIRS),
      );
    });

    it('should point plain text at /start', async () => {
      await say('what is the ratio?');

      expect(api.sendMessage).toHaveBeenCalledWith(
        CHAT,
        'Use /start to see available commands or click the buttons below:',
        mainKeyboard(),
      );
    });

    it('should ignore non-text messages', async () => {
      await say(null);

      expect(api.sendMessage).not.toHaveBeenCalled();
    });
  });

  describe('buttons', () => {
    it('should answer a ratio press with the simple ratio and a volume button', async () => {
      await press('ratio:BTC-ETH');

      expect(api.answerCallbackQuery).toHaveBeenCalledWith('cb-1');
      expect(calculator.calculateSimpleRatio).toHaveBeenCalledWith(
        'BTC-ETH',
        'BTCUSDT',
        'ETHUSDT',
      );
      expect(api.sendMessage).toHaveBeenNthCalledWith(
        1,
        CHAT,
        '\u{23F3} Calculating ratio...',
        undefined,
      );
      expect(api.sendMessage).toHaveBeenNthCalledWith(
        2,
        CHAT,
        formatSimpleRatioReply(simpleRatio),
        volumeAnalysisKeyboard('BTC-ETH', 1),
      );
    });

    it('should offer only navigation for a pair without analysisVolume', async () => {
      await press('ratio:SOL-BNB');

      expect(api.sendMessage).toHaveBeenLastCalledWith(
        CHAT,
        formatSimpleRatioReply(simpleRatio),
        backKeyboard(),
      );
    });

    it('should report a failed calculation in the chat', async () => {
      calculator.calculateSimpleRatio.mockRejectedValue(new Error('Request timed out'));

      await press('ratio:BTC-ETH');

      expect(api.sendMessage).toHaveBeenLastCalledWith(
        CHAT,
        '\u{274C} Error calculating ratio: Request timed out',
        undefined,
      );
    });

    it('should run the volume analysis with the configured analysisVolume', async () => {
      await press('volume:BTC-ETH');

      expect(calculator.calculateVolumeRatio).toHaveBeenCalledWith(
        'BTC-ETH',
        'BTCUSDT',
        'ETHUSDT',
        1,
      );
      expect(api.sendMessage).toHaveBeenNthCalledWith(
        1,
        CHAT,
        '\u{23F3} Analyzing order book...',
        undefined,
      );
      expect(api.sendMessage).toHaveBeenLastCalledWith(
        CHAT,
        formatVolumeRatioReply(volumeRatio),
        backKeyboard(),
      );
    });

    it('should refuse a volume analysis for a pair without analysisVolume', async () => {
      await press('volume:SOL-BNB');

      expect(calculator.calculateVolumeRatio).not.toHaveBeenCalled();
      expect(api.sendMessage).toHaveBeenCalledWith(
        CHAT,
        'Pair SOL-BNB has no analysisVolume configured',
        backKeyboard(),
      );
    });

    it('should report an unknown pair', async () => {
      await press('ratio:XRP-ADA');

      expect(calculator.calculateSimpleRatio).not.toHaveBeenCalled();
      expect(api.sendMessage).toHaveBeenCalledWith(CHAT, 'Unknown pair: XRP-ADA', undefined);
    });

    it('should navigate back to the pair list and the main menu', async () => {
      await press('back_to_pairs');
      await press('main:ratios');
      await press('main_menu');
      await press('main:pairs');

      expect(api.sendMessage.mock.calls).toEqual([
        [CHAT, '\u{1F4CA} Select a ratio pair:', pairSelectionKeyboard(PAIRS)],
        [CHAT, '\u{1F4CA} Select a ratio pair:', pairSelectionKeyboard(PAIRS)],
        [CHAT, 'Main menu:', mainKeyboard()],
        [CHAT, formatPairsList(PAIRS), backKeyboard()],
      ]);
    });

    it('should only acknowledge a press whose message is gone', async () => {
      await press('ratio:BTC-ETH', null);

      expect(api.answerCallbackQuery).toHaveBeenCalledWith('cb-1');
      expect(api.sendMessage).not.toHaveBeenCalled();
    });
  });
});
