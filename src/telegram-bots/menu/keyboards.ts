import { Markup } from 'telegraf';
import type { ExtraReplyMessage } from 'telegraf/typings/telegram-types';
import type { ReplyMarkup } from '../interfaces/bot-reply.interface';
import { CALLBACK_TAGS, MENU_LABELS } from './actions';

export function mainMenuKeyboard() {
  return Markup.keyboard([
    [MENU_LABELS.viewServices, MENU_LABELS.placeOrder],
    [MENU_LABELS.scheduleTalk, MENU_LABELS.directMessage],
    [MENU_LABELS.viewChannel],
  ]).resize();
}

export function flowActionsKeyboard() {
  return Markup.inlineKeyboard([
    [Markup.button.callback(MENU_LABELS.placeOrder, CALLBACK_TAGS.placeOrder)],
    [Markup.button.callback(MENU_LABELS.scheduleTalk, CALLBACK_TAGS.scheduleTalk)],
    [Markup.button.callback(MENU_LABELS.directMessage, CALLBACK_TAGS.directMessage)],
  ]);
}

export function buildReplyExtra(markup?: ReplyMarkup): ExtraReplyMessage {
  const extra: ExtraReplyMessage = { parse_mode: 'HTML' };
  if (!markup) return extra;

  switch (markup.type) {
    case 'main_menu':
      return { ...extra, ...mainMenuKeyboard() };
    case 'remove':
      return { ...extra, ...Markup.removeKeyboard() };
    case 'flow_actions':
      return { ...extra, ...flowActionsKeyboard() };
    case 'link':
      return { ...extra, ...Markup.inlineKeyboard([Markup.button.url(markup.label, markup.url)]) };
  }
}
