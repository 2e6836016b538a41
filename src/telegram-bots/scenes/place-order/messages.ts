import type { Order } from '@common/entities/order.entity';
import { escapeHtml, formatContactDisplay } from '@shared/helpers/text.helper';
import { CANCEL_HINT } from '../common/utils';
import { STEP_HINTS } from './constants';
import type { ServiceOption } from './types';

export function buildIntroMessage(): string {
  return ['🛒 <b>Place an Order</b>', '', "Let's get your print order started.", CANCEL_HINT, '', STEP_HINTS.name].join(
    '\n',
  );
}

export function buildNameStepResponse(customerName: string): string {
  return `Nice to meet you, ${escapeHtml(customerName)}! 👋\n\n${STEP_HINTS.company}`;
}

export function buildServiceListMessage(companyName: string | null, options: ServiceOption[]): string {
  const lines = [companyName ? `✅ Company: ${escapeHtml(companyName)}` : '✅ Personal order', ''];
  if (!options.length) {
    lines.push('🖨️ What would you like us to print? Describe it in a few words.');
    return lines.join('\n');
  }
  lines.push('🖨️ <b>Which service do you need?</b>', '');
  options.forEach((option, index) => lines.push(`${index + 1}. ${escapeHtml(option.name)}`));
  lines.push('', '<i>Reply with the number or the name of the service.</i>');
  return lines.join('\n');
}

export function buildServiceStepResponse(productType: string): string {
  return `✅ Service: ${escapeHtml(productType)}\n\n${STEP_HINTS.quantity}`;
}

export function buildQuantityStepResponse(quantity: number): string {
  return `✅ Quantity: ${quantity.toLocaleString('en-US')}\n\n${STEP_HINTS.delivery_date}`;
}

export function buildDeliveryDateStepResponse(deliveryDate: string): string {
  return `✅ Delivery date: ${deliveryDate} (DD/MM/YYYY)\n\n${STEP_HINTS.contact}`;
}

export function buildOrderSummary(order: Order): string {
  const lines = [
    '✅ <b>Order placed successfully!</b>',
    '',
    `📋 <b>Order ID:</b> #${order.id}`,
    `👤 <b>Name:</b> ${escapeHtml(order.customerName)}`,
  ];
  if (order.companyName) {
    lines.push(`🏢 <b>Company:</b> ${escapeHtml(order.companyName)}`);
  }
  lines.push(
    `🖨️ <b>Service:</b> ${escapeHtml(order.productType)}`,
    `🔢 <b>Quantity:</b> ${order.quantity.toLocaleString('en-US')}`,
    `📅 <b>Delivery Date:</b> ${order.deliveryDate}`,
    `<b>Contact:</b> ${escapeHtml(formatContactDisplay(order.contactInfo))}`,
    '',
    "We'll get back to you shortly with a quote. Thank you! 🙏",
  );
  return lines.join('\n');
}
