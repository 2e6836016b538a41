import { CustomerMessage } from '@common/entities/customer-message.entity';
import { Order } from '@common/entities/order.entity';
import { Schedule } from '@common/entities/schedule.entity';
import { escapeHtml, formatContactDisplay, truncate } from '@shared/helpers/text.helper';
import { formatTimestamp } from '@shared/validators/date-parsing';
import type { TelegramProfile } from 'src/crm/interfaces/customer-request.interface';

export const MESSAGE_PREVIEW_LENGTH = 200;

export interface BusinessInfo {
  name: string;
  phone: string;
  email: string;
}

export function buildNewOrderNotification(order: Order): string {
  const company = order.companyName ? ` (${escapeHtml(order.companyName)})` : '';
  return [
    '🆕 <b>NEW ORDER RECEIVED!</b>',
    '',
    `📋 <b>Order ID:</b> #${order.id}`,
    `👤 <b>Customer:</b> ${escapeHtml(order.customerName)}${company}`,
    `🖨️ <b>Product:</b> ${escapeHtml(order.productType)}`,
    `🔢 <b>Quantity:</b> ${order.quantity}`,
    `📅 <b>Delivery Date:</b> ${escapeHtml(order.deliveryDate)}`,
    `<b>Contact:</b> ${escapeHtml(formatContactDisplay(order.contactInfo))}`,
    `⏰ <b>Received:</b> ${formatTimestamp(order.createdAt)}`,
  ].join('\n');
}

export function buildNewScheduleNotification(schedule: Schedule): string {
  return [
    '📅 <b>NEW CONSULTATION SCHEDULED!</b>',
    '',
    `📋 <b>Schedule ID:</b> #${schedule.id}`,
    `👤 <b>Customer:</b> ${escapeHtml(schedule.customerName)}`,
    `<b>Contact:</b> ${escapeHtml(formatContactDisplay(schedule.contactInfo))}`,
    `🕐 <b>Preferred Time:</b> ${escapeHtml(schedule.preferredDatetime)}`,
    `⏰ <b>Received:</b> ${formatTimestamp(schedule.createdAt)}`,
  ].join('\n');
}

export function buildNewMessageNotification(message: CustomerMessage): string {
  return [
    '💬 <b>NEW DIRECT MESSAGE!</b>',
    '',
    `📋 <b>Message ID:</b> #${message.id}`,
    `👤 <b>From:</b> ${escapeHtml(message.customerName)}`,
    `<b>Contact:</b> ${escapeHtml(formatContactDisplay(message.contactInfo))}`,
    '💭 <b>Message:</b>',
    `<i>${escapeHtml(truncate(message.messageText, MESSAGE_PREVIEW_LENGTH))}</i>`,
    `⏰ <b>Received:</b> ${formatTimestamp(message.createdAt)}`,
  ].join('\n');
}

export function describeProfile(profile: TelegramProfile): string {
  const fullName = [profile.firstName, profile.lastName].filter(Boolean).join(' ') || 'Unknown customer';
  return profile.username ? `${fullName} (@${profile.username})` : fullName;
}

export function buildForwardedMessage(profile: TelegramProfile, chatId: string, text: string): string {
  return [
    '📨 <b>Message from customer</b>',
    '',
    `👤 <b>From:</b> ${escapeHtml(describeProfile(profile))}`,
    `🆔 <b>Chat ID:</b> <code>${escapeHtml(chatId)}</code>`,
    '',
    escapeHtml(text),
    '',
    `↩️ Reply with: <code>/reply ${escapeHtml(chatId)} your message</code>`,
  ].join('\n');
}

export function buildBroadcast(title: string, content: string, business?: BusinessInfo): string {
  const lines = [`📢 <b>${escapeHtml(title)}</b>`, '', escapeHtml(content)];
  if (business) {
    lines.push(
      '',
      `🏢 <b>${escapeHtml(business.name)}</b>`,
      `📞 ${escapeHtml(business.phone)}`,
      `📧 ${escapeHtml(business.email)}`,
    );
  }
  return lines.join('\n');
}

export function buildCustomerReply(businessName: string, text: string): string {
  return [`💬 <b>Reply from ${escapeHtml(businessName)}</b>`, '', escapeHtml(text)].join('\n');
}
