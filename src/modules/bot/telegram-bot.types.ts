/** Telegram Bot API shapes used by the interactive bot, normalised to camelCase. */

export interface InlineKeyboardButton {
  text: string;
  callback_data: string;
}

export interface InlineKeyboardMarkup {
  inline_keyboard: InlineKeyboardButton[][];
}

export interface BotMessage {
  chatId: number;
  /** null for stickers, photos and other non-text messages */
  text: string | null;
}

export interface BotCallbackQuery {
  id: string;
  data: string | null;
  /** null when the originating message is no longer accessible */
  chatId: number | null;
}

export interface BotUpdate {
  updateId: number;
  message?: BotMessage;
  callbackQuery?: BotCallbackQuery;
}

export interface BotReply {
  text: string;
  keyboard?: InlineKeyboardMarkup;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function chatIdOf(message: unknown): number | null {
  if (!isRecord(message) || !isRecord(message.chat)) return null;
  return typeof message.chat.id === 'number' ? message.chat.id : null;
}

function parseMessage(raw: unknown): BotMessage | undefined {
  const chatId = chatIdOf(raw);
  if (!isRecord(raw) || chatId === null) return undefined;
  return { chatId, text: typeof raw.text === 'string' ? raw.text : null };
}

function parseCallbackQuery(raw: unknown): BotCallbackQuery | undefined {
  if (!isRecord(raw) || typeof raw.id !== 'string') return undefined;
  return {
    id: raw.id,
    data: typeof raw.data === 'string' ? raw.data : null,
    chatId: chatIdOf(raw.message),
  };
}

/**
 * Extracts updates from a getUpdates `result` array. Entries without a
 * numeric update_id are dropped; unsupported update kinds keep their id so
 * the offset still advances past them.
 */
export function parseUpdates(result: unknown): BotUpdate[] {
  if (!Array.isArray(result)) return [];
  const updates: BotUpdate[] = [];
  for (const entry of result) {
    if (!isRecord(entry) || typeof entry.update_id !== 'number') continue;
    const update: BotUpdate = { updateId: entry.update_id };
    const message = parseMessage(entry.message);
    if (message) update.message = message;
    const callbackQuery = parseCallbackQuery(entry.callback_query);
    if (callbackQuery) update.callbackQuery = callbackQuery;
    updates.push(update);
  }
  return updates;
}
