import type { PrintService } from '@common/entities/print-service.entity';
import { escapeHtml } from '@shared/helpers/text.helper';
import type { FlowName } from './actions';
import { MENU_LABELS } from './actions';

export function buildWelcomeMessage(businessName: string, welcomeText: string): string {
  return [
    `👋 <b>Welcome to ${escapeHtml(businessName)}!</b>`,
    '',
    escapeHtml(welcomeText),
    '',
    'Choose an option from the menu below.',
  ].join('\n');
}

export function buildHelpMessage(): string {
  return [
    'ℹ️ <b>How can we help?</b>',
    '',
    `${MENU_LABELS.viewServices}: browse what we print and typical prices`,
    `${MENU_LABELS.placeOrder}: request a quote in a few steps`,
    `${MENU_LABELS.scheduleTalk}: book a call with our team`,
    `${MENU_LABELS.directMessage}: send us a question`,
    `${MENU_LABELS.viewChannel}: see our latest work and offers`,
    '',
    '/start shows the menu again, /cancel stops the current step-by-step form.',
  ].join('\n');
}

export function buildServicesMessage(services: PrintService[]): string {
  if (!services.length) {
    return '📋 Our catalog is being updated. Send us a message and we will help you directly.';
  }
  const lines = ['📋 <b>Our Services</b>', ''];
  for (const service of services) {
    lines.push(`🖨️ <b>${escapeHtml(service.name)}</b>`);
    if (service.description) lines.push(escapeHtml(service.description));
    if (service.priceRange) lines.push(`💰 ${escapeHtml(service.priceRange)}`);
    lines.push(`⏱️ ${escapeHtml(service.processingTime)}`, '');
  }
  lines.push('Ready to start? Pick an option below.');
  return lines.join('\n');
}

export function buildChannelMessage(): string {
  return '📢 Follow our channel for new work, offers and updates.';
}

export const CHANNEL_NOT_CONFIGURED = '📢 Our channel is not available yet. Check back soon!';

export const CANCELLED_MESSAGES: Record<FlowName, string> = {
  order: '❌ Order cancelled. Nothing was saved.',
  schedule: '❌ Consultation request cancelled.',
  message: '❌ Message cancelled.',
};

export const NOTHING_TO_CANCEL = 'Nothing to cancel. Choose an option from the menu.';

export const FORWARDED_REPLY = "✅ Thanks! We've passed your message on and will get back to you soon.";

export const FORWARD_FAILED_REPLY = `⚠️ We couldn't pass that on right now. Please use ${MENU_LABELS.directMessage} so we can get back to you.`;

export const UNKNOWN_CALLBACK_REPLY = 'That button is no longer active. Here is the menu again.';

export const ADMIN_REPLY_USAGE = 'Usage: /reply &lt;chatId&gt; &lt;message&gt;';

export const ADMIN_ONLY = '⛔ This command is only available to the shop administrator.';

export function buildAdminReplyResult(chatId: string, delivered: boolean): string {
  return delivered ? `✅ Reply sent to ${escapeHtml(chatId)}.` : `❌ Could not deliver the reply to ${escapeHtml(chatId)}.`;
}

export function buildAdminFallbackHint(): string {
  return `To answer a customer, send ${ADMIN_REPLY_USAGE}`;
}
