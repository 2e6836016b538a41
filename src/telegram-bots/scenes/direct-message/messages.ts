import type { CustomerMessage } from '@common/entities/customer-message.entity';
import { escapeHtml } from '@shared/helpers/text.helper';
import { CANCEL_HINT } from '../common/utils';

export const STEP_HINTS = {
  name: "👤 What's your full name?",
  contact: '📞 Send a phone number or an email address so we can get back to you.',
  text: '💬 Type your message (5 to 1000 characters).',
} as const;

export function buildIntroMessage(): string {
  return ['💬 <b>Message Me Directly</b>', '', CANCEL_HINT, '', STEP_HINTS.name].join('\n');
}

export function buildNameStepResponse(customerName: string): string {
  return `Hi ${escapeHtml(customerName)}! 👋\n\n${STEP_HINTS.contact}`;
}

export function buildContactStepResponse(): string {
  return `✅ Got it.\n\n${STEP_HINTS.text}`;
}

export function buildMessageReceipt(message: CustomerMessage): string {
  return [
    '✅ <b>Message sent!</b>',
    '',
    `📋 <b>Reference:</b> #${message.id}`,
    "We've received your message and will reply as soon as possible.",
  ].join('\n');
}
