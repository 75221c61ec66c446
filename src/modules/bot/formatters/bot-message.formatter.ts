import Decimal from 'decimal.js';
import type {
  MonitoredPair,
  SimpleRatio,
  VolumeRatio,
} from '../../../common/types/index.js';
import {
  escapeHtml,
  formatRatio,
  formatUsd,
} from '../../monitoring/formatters/telegram-message.formatter.js';
import type { InlineKeyboardMarkup } from '../telegram-bot.types.js';

/** Callback data carried by inline buttons. */
export const CALLBACK = {
  MAIN_RATIOS: 'main:ratios',
  MAIN_PAIRS: 'main:pairs',
  MAIN_MENU: 'main_menu',
  BACK_TO_PAIRS: 'back_to_pairs',
  RATIO_PREFIX: 'ratio:',
  VOLUME_PREFIX: 'volume:',
} as const;

const COMMAND_LIST = [
  '/pairs - View all configured ratio pairs',
  '/ratio - Get current ratios',
  '/help - Show this help message',
];

export function formatWelcome(): string {
  return [
    '\u{1F44B} <b>Welcome to the Ratio Monitor bot!</b>',
    '',
    'I can help you watch cryptocurrency price ratios from Binance.',
    '',
    '<b>Available Commands:</b>',
    ...COMMAND_LIST,
    '',
    'Click the buttons below or use commands to get started!',
  ].join('\n');
}

export function formatHelp(): string {
  return [
    '\u{1F50D} <b>Ratio Monitor Bot Help</b>',
    '',
    '<b>Commands:</b>',
    '/start - Start the bot',
    ...COMMAND_LIST,
    '',
    '<b>Features:</b>',
    '\u{2705} Simple price ratios',
    '\u{2705} Volume-based calculations',
    '\u{2705} Real-time data from Binance',
    '\u{2705} Interactive pair selection',
  ].join('\n');
}

export function formatPairsList(pairs: readonly MonitoredPair[]): string {
  if (pairs.length === 0) {
    return '\u{1F4CB} <b>Configured Ratio Pairs</b>\n\nNo pairs configured.';
  }
  const entries = pairs.map((pair, i) => {
    const lines = [
      `${i + 1}. <b>${escapeHtml(pair.name)}</b>`,
      `   ${escapeHtml(pair.symbolA)} / ${escapeHtml(pair.symbolB)}`,
    ];
    if (pair.analysisVolume !== undefined) {
      lines.push(`   Volume: ${pair.analysisVolume}`);
    }
    return lines.join('\n');
  });
  return ['\u{1F4CB} <b>Configured Ratio Pairs</b>', '', entries.join('\n\n')].join(
    '\n',
  );
}

export function formatSimpleRatioReply(ratio: SimpleRatio): string {
  return [
    `\u{1F4C8} <b>${escapeHtml(ratio.pairName)}</b>`,
    '',
    `Ratio: <code>${formatRatio(ratio.ratio)}</code>`,
    '',
    `${escapeHtml(ratio.symbolA)} - ${formatUsd(ratio.priceA)}`,
    `${escapeHtml(ratio.symbolB)} - ${formatUsd(ratio.priceB)}`,
    '',
    `<i>Time: ${ratio.timestamp.toISOString()}</i>`,
  ].join('\n');
}

export function formatVolumeRatioReply(ratio: VolumeRatio): string {
  const leg = (symbol: string, price: number, slippage: number): string[] => [
    `<b>${escapeHtml(symbol)}</b>`,
    `Effective Price: ${formatUsd(price)}`,
    `Slippage: ${new Decimal(slippage).toFixed(3)}%`,
  ];
  return [
    '\u{1F4CA} <b>Volume-Based Analysis</b>',
    '',
    `Pair: ${escapeHtml(ratio.pairName)}`,
    `Volume: ${ratio.volume}`,
    `Ratio: <code>${formatRatio(ratio.ratio)}</code>`,
    '',
    ...leg(ratio.symbolA, ratio.effectivePriceA, ratio.slippageA),
    '',
    ...leg(ratio.symbolB, ratio.effectivePriceB, ratio.slippageB),
    '',
    `<i>Time: ${ratio.timestamp.toISOString()}</i>`,
  ].join('\n');
}

export function formatBotError(action: string, error: unknown): string {
  const message = error instanceof Error ? error.message : String(error);
  return `\u{274C} Error ${action}: ${escapeHtml(message)}`;
}

export function mainKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [{ text: '\u{1F4CA} Get Ratios', callback_data: CALLBACK.MAIN_RATIOS }],
      [{ text: '\u{1F4CB} View Pairs', callback_data: CALLBACK.MAIN_PAIRS }],
    ],
  };
}

export function pairSelectionKeyboard(
  pairs: readonly MonitoredPair[],
): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      ...pairs.map((pair) => [
        { text: pair.name, callback_data: `${CALLBACK.RATIO_PREFIX}${pair.name}` },
      ]),
      [{ text: '\u{00AB} Back', callback_data: CALLBACK.MAIN_MENU }],
    ],
  };
}

export function volumeAnalysisKeyboard(
  pairName: string,
  volume: number,
): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [
        {
          text: `\u{1F4CA} Volume Analysis (${volume})`,
          callback_data: `${CALLBACK.VOLUME_PREFIX}${pairName}`,
        },
      ],
      [{ text: '\u{00AB} Back to Pairs', callback_data: CALLBACK.BACK_TO_PAIRS }],
    ],
  };
}

export function backKeyboard(): InlineKeyboardMarkup {
  return {
    inline_keyboard: [
      [{ text: '\u{00AB} Back to Pairs', callback_data: CALLBACK.BACK_TO_PAIRS }],
      [{ text: '\u{00AB} Main Menu', callback_data: CALLBACK.MAIN_MENU }],
    ],
  };
}
