export type ReplyMarkup =
  | { type: 'main_menu' }
  | { type: 'remove' }
  | { type: 'flow_actions' }
  | { type: 'link'; label: string; url: string };

/** A single outgoing message; text is Telegram HTML. */
export interface BotReply {
  text: string;
  markup?: ReplyMarkup;
}

export interface HandleMessageResponse {
  messages: BotReply[];
}
