export const MESSAGE_STEPS = ['name', 'contact', 'text'] as const;

export type MessageStep = (typeof MESSAGE_STEPS)[number];

export interface MessageStateData {
  customerName?: string;
  contactInfo?: string;
}

export interface MessageState {
  step: MessageStep;
  data: MessageStateData;
}
