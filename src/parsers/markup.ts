import type { RawKeyboardButton, RawKeyboardButtonRow, RawReplyMarkup } from '../raw/index.js';

export interface KeyboardButton {
  text: string;
  requestContact?: boolean;
  requestLocation?: boolean;
  webAppUrl?: string;
}

export interface InlineKeyboardButton {
  text: string;
  url?: string;
  callbackData?: Uint8Array;
  requiresPassword?: boolean;
  switchInlineQuery?: string;
  switchInlineQueryCurrentChat?: string;
  callbackGame?: true;
  pay?: true;
  webAppUrl?: string;
  userId?: number;
  copyText?: string;
}

export interface ReplyKeyboardMarkup {
  keyboard: KeyboardButton[][];
  isPersistent: boolean;
  resizeKeyboard: boolean;
  oneTimeKeyboard: boolean;
  selective: boolean;
  placeholder?: string;
}

export interface InlineKeyboardMarkup {
  inlineKeyboard: InlineKeyboardButton[][];
}

export interface ReplyKeyboardRemove {
  selective: boolean;
}

export interface ForceReply {
  selective: boolean;
  placeholder?: string;
}

export type ReplyMarkup =
  | { type: 'forceReply'; forceReply: ForceReply }
  | { type: 'replyKeyboard'; replyKeyboard: ReplyKeyboardMarkup }
  | { type: 'inlineKeyboard'; inlineKeyboard: InlineKeyboardMarkup }
  | { type: 'replyKeyboardRemove'; replyKeyboardRemove: ReplyKeyboardRemove };

function parseKeyboardButton(button: RawKeyboardButton): KeyboardButton {
  switch (button._) {
    case 'keyboardButtonRequestPhone':
      return { text: button.text, requestContact: true };
    case 'keyboardButtonRequestGeoLocation':
      return { text: button.text, requestLocation: true };
    case 'keyboardButtonWebView':
    case 'keyboardButtonSimpleWebView':
      return { text: button.text, webAppUrl: button.url };
    default:
      return { text: button.text };
  }
}

function parseInlineButton(button: RawKeyboardButton): InlineKeyboardButton | null {
  switch (button._) {
    case 'keyboardButtonUrl':
      return { text: button.text, url: button.url };
    case 'keyboardButtonCallback': {
      const parsed: InlineKeyboardButton = { text: button.text, callbackData: button.data };
      if (button.requires_password) parsed.requiresPassword = true;
      return parsed;
    }
    case 'keyboardButtonSwitchInline':
      return button.same_peer
        ? { text: button.text, switchInlineQueryCurrentChat: button.query }
        : { text: button.text, switchInlineQuery: button.query };
    case 'keyboardButtonGame':
      return { text: button.text, callbackGame: true };
    case 'keyboardButtonBuy':
      return { text: button.text, pay: true };
    case 'keyboardButtonWebView':
    case 'keyboardButtonSimpleWebView':
      return { text: button.text, webAppUrl: button.url };
    case 'keyboardButtonUserProfile':
      return { text: button.text, userId: button.user_id };
    case 'keyboardButtonCopy':
      return { text: button.text, copyText: button.copy_text };
    default:
      return null;
  }
}

function parseInlineRows(rows: RawKeyboardButtonRow[]): InlineKeyboardButton[][] {
  return rows.map((row) => {
    const buttons: InlineKeyboardButton[] = [];
    for (const button of row.buttons) {
      const parsed = parseInlineButton(button);
      if (parsed) buttons.push(parsed);
    }
    return buttons;
  });
}

export function parseReplyMarkup(markup: RawReplyMarkup | undefined): ReplyMarkup | null {
  if (!markup) return null;

  switch (markup._) {
    case 'replyKeyboardForceReply': {
      const forceReply: ForceReply = { selective: !!markup.selective };
      if (markup.placeholder) forceReply.placeholder = markup.placeholder;
      return { type: 'forceReply', forceReply };
    }
    case 'replyKeyboardMarkup': {
      const replyKeyboard: ReplyKeyboardMarkup = {
        keyboard: markup.rows.map((row) => row.buttons.map(parseKeyboardButton)),
        isPersistent: !!markup.persistent,
        resizeKeyboard: !!markup.resize,
        oneTimeKeyboard: !!markup.single_use,
        selective: !!markup.selective,
      };
      if (markup.placeholder) replyKeyboard.placeholder = markup.placeholder;
      return { type: 'replyKeyboard', replyKeyboard };
    }
    case 'replyInlineMarkup':
      return { type: 'inlineKeyboard', inlineKeyboard: { inlineKeyboard: parseInlineRows(markup.rows) } };
    case 'replyKeyboardHide':
      return { type: 'replyKeyboardRemove', replyKeyboardRemove: { selective: !!markup.selective } };
    default:
      return null;
  }
}
