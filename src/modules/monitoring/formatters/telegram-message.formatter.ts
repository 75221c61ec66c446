import Decimal from 'decimal.js';
import type { SimpleRatio } from '../../../common/types/index.js';

const EMOJI = {
  up: '\u{1F4C8}',
  down: '\u{1F4C9}',
  digest: '\u{1F4CA}',
  connected: '\u{2705}',
} as const;

const MAX_MESSAGE_LENGTH = 4096;
const FOOTER_RESERVE = 200;
/** Room for the closing tags appended after truncation. */
const CLOSING_TAG_RESERVE = 64;
const TRUNCATION_MARKER = '\n[...truncated...]\n';

/**
 * Escape HTML special characters in dynamic values.
 */
export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;');
}

/** Cut position at or before `limit` that does not split a line, tag or entity. */
function headCutIndex(text: string, limit: number): number {
  const newline = text.lastIndexOf('\n', limit);
  if (newline !== -1) return newline;
  let cut = limit;
  const tagOpen = text.lastIndexOf('<', cut - 1);
  if (tagOpen > text.lastIndexOf('>', cut - 1)) cut = tagOpen;
  const entityOpen = text.lastIndexOf('&', cut - 1);
  if (entityOpen > text.lastIndexOf(';', cut - 1)) cut = entityOpen;
  return cut;
}

/** Start position at or after `from` that begins a whole line, or follows a tag or entity. */
function tailStartIndex(text: string, from: number): number {
  const newline = text.indexOf('\n', from);
  if (newline !== -1) return newline + 1;
  let start = from;
  if (text.lastIndexOf('<', start - 1) > text.lastIndexOf('>', start - 1)) {
    const close = text.indexOf('>', start);
    start = close === -1 ? text.length : close + 1;
  }
  if (text.lastIndexOf('&', start - 1) > text.lastIndexOf(';', start - 1)) {
    const close = text.indexOf(';', start);
    start = close === -1 ? text.length : close + 1;
  }
  return start;
}

/**
 * Smart truncation preserving header and footer. Cuts fall on line
 * boundaries where there are any, and never inside a tag or entity.
 */
export function smartTruncate(text: string): string {
  if (text.length <= MAX_MESSAGE_LENGTH) return text;

  const footer = text.slice(
    tailStartIndex(text, text.length - FOOTER_RESERVE),
  );
  const headerBudget =
    MAX_MESSAGE_LENGTH -
    TRUNCATION_MARKER.length -
    footer.length -
    CLOSING_TAG_RESERVE;
  const header = text.slice(0, headCutIndex(text, headerBudget));

  return closeUnclosedTags(header + TRUNCATION_MARKER + footer);
}

function closeUnclosedTags(html: string): string {
  const openTags: string[] = [];
  for (const match of html.matchAll(/<(b|i|code|pre|u|s|a)\b[^>]*>/gi)) {
    const tag = match[1];
    if (tag) openTags.push(tag.toLowerCase());
  }
  for (const match of html.matchAll(/<\/(b|i|code|pre|u|s|a)>/gi)) {
    const idx = match[1] ? openTags.lastIndexOf(match[1].toLowerCase()) : -1;
    if (idx !== -1) openTags.splice(idx, 1);
  }
  return html + openTags.reverse().map((tag) => `</${tag}>`).join('');
}

/** 45 → "45s", 300 → "5m", 7200 → "2h" (whole units, rounded down). */
export function formatWindow(seconds: number): string {
  if (seconds < 60) return `${seconds}s`;
  if (seconds < 3600) return `${Math.floor(seconds / 60)}m`;
  return `${Math.floor(seconds / 3600)}h`;
}

export function formatRatio(ratio: number): string {
  return new Decimal(ratio).toFixed(8);
}

/** Always signed: "+6.00%", "-2.50%". */
export function formatSignedPct(pct: number): string {
  const fixed = new Decimal(pct).toFixed(2);
  return pct > 0 || fixed === '0.00' ? `+${fixed}%` : `${fixed}%`;
}

export function formatUsd(price: number): string {
  return `$${new Decimal(price).toFixed(2)}`;
}

function formatTimestamp(date: Date): string {
  return date.toISOString();
}

export interface RatioAlertMessage {
  pairName: string;
  ratio: number;
  changePct: number;
  threshold: number;
  windowSecs: number;
  timestamp: Date;
}

export function formatRatioAlert(alert: RatioAlertMessage): string {
  const emoji = alert.changePct > 0 ? EMOJI.up : EMOJI.down;
  return [
    `${emoji} <b>Ratio Alert: ${escapeHtml(alert.pairName)}</b>`,
    '',
    `Current Ratio: <code>${formatRatio(alert.ratio)}</code>`,
    `Change: <code>${formatSignedPct(alert.changePct)}</code> in ${formatWindow(alert.windowSecs)}`,
    `Threshold: <code>${alert.threshold}%</code>`,
    `Time: <code>${formatTimestamp(alert.timestamp)}</code>`,
  ].join('\n');
}

export function formatPeriodicDigest(
  ratios: readonly SimpleRatio[],
  timestamp: Date,
): string {
  const blocks = ratios.map((r) =>
    [
      `<b>${escapeHtml(r.pairName)}</b>`,
      `<code>${formatRatio(r.ratio)}</code>`,
      `${escapeHtml(r.symbolA)} ${formatUsd(r.priceA)} / ${escapeHtml(r.symbolB)} ${formatUsd(r.priceB)}`,
    ].join('\n'),
  );
  return smartTruncate(
    [
      `${EMOJI.digest} <b>Periodic Ratio Update</b>`,
      '',
      blocks.join('\n\n'),
      '',
      `<i>Time: ${formatTimestamp(timestamp)}</i>`,
    ].join('\n'),
  );
}

export function formatConnectionTest(timestamp: Date): string {
  return [
    `${EMOJI.connected} <b>Ratio monitor is connected and ready</b>`,
    `Time: <code>${formatTimestamp(timestamp)}</code>`,
  ].join('\n');
}
