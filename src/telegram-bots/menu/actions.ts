export const FLOWS = ['order', 'schedule', 'message'] as const;

export type FlowName = (typeof FLOWS)[number];

export const MENU_LABELS = {
  viewServices: '📋 View Services',
  placeOrder: '🛒 Place Order',
  scheduleTalk: '📅 Schedule a Talk',
  directMessage: '💬 Message Me Directly',
  viewChannel: '📢 View Channel',
} as const;

export const CALLBACK_TAGS = {
  placeOrder: 'place_order',
  scheduleTalk: 'schedule_talk',
  directMessage: 'direct_message',
  viewServices: 'view_services',
  viewChannel: 'view_channel',
} as const;

export const CANCEL_COMMANDS = ['cancel', 'stop', 'exit'] as const;

export type BotAction =
  | { type: 'start' }
  | { type: 'help' }
  | { type: 'cancel' }
  | { type: 'view_services' }
  | { type: 'view_channel' }
  | { type: 'start_flow'; flow: FlowName }
  | { type: 'admin_reply'; chatId: string; text: string }
  | { type: 'text'; text: string }
  | { type: 'unknown_callback'; data: string };

export interface IncomingInput {
  text?: string;
  callbackData?: string;
}

export interface DecodeOptions {
  /** While a flow is active, menu labels are treated as answers. */
  inFlow: boolean;
}

const LABEL_ACTIONS = new Map<string, BotAction>([
  [MENU_LABELS.viewServices, { type: 'view_services' }],
  [MENU_LABELS.placeOrder, { type: 'start_flow', flow: 'order' }],
  [MENU_LABELS.scheduleTalk, { type: 'start_flow', flow: 'schedule' }],
  [MENU_LABELS.directMessage, { type: 'start_flow', flow: 'message' }],
  [MENU_LABELS.viewChannel, { type: 'view_channel' }],
]);

const CALLBACK_ACTIONS = new Map<string, BotAction>([
  [CALLBACK_TAGS.viewServices, { type: 'view_services' }],
  [CALLBACK_TAGS.placeOrder, { type: 'start_flow', flow: 'order' }],
  [CALLBACK_TAGS.scheduleTalk, { type: 'start_flow', flow: 'schedule' }],
  [CALLBACK_TAGS.directMessage, { type: 'start_flow', flow: 'message' }],
  [CALLBACK_TAGS.viewChannel, { type: 'view_channel' }],
]);

const COMMAND_PATTERN = /^\/([a-z_]+)(?:@\w+)?(?:\s+([\s\S]*))?$/i;

function decodeCommand(text: string): BotAction | null {
  const match = COMMAND_PATTERN.exec(text);
  if (!match) return null;

  const command = match[1].toLowerCase();
  const args = (match[2] ?? '').trim();

  if (command === 'start') return { type: 'start' };
  if (command === 'help') return { type: 'help' };
  if (CANCEL_COMMANDS.some((name) => name === command)) return { type: 'cancel' };
  if (command === 'reply') {
    const chatId = args.split(/\s+/)[0];
    return { type: 'admin_reply', chatId, text: args.slice(chatId.length).trim() };
  }
  return null;
}

export function decodeAction(input: IncomingInput, options: DecodeOptions): BotAction {
  if (input.callbackData !== undefined) {
    return CALLBACK_ACTIONS.get(input.callbackData) ?? { type: 'unknown_callback', data: input.callbackData };
  }

  const text = (input.text ?? '').trim();
  const command = decodeCommand(text);
  if (command) return command;

  if (!options.inFlow) {
    const labelled = LABEL_ACTIONS.get(text);
    if (labelled) return labelled;
  }

  return { type: 'text', text };
}

export function assertNever(value: never): never {
  throw new Error(`Unhandled bot action: ${JSON.stringify(value)}`);
}
