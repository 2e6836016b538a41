import type { Schedule } from '@common/entities/schedule.entity';
import { escapeHtml, formatContactDisplay } from '@shared/helpers/text.helper';
import { BUSINESS_HOURS } from '@shared/validators/input.validators';
import { CANCEL_HINT } from '../common/utils';
import { STEP_HINTS } from './constants';

const pad = (value: number): string => String(value).padStart(2, '0');

export function buildIntroMessage(): string {
  return [
    '📅 <b>Schedule a Talk</b>',
    '',
    `We're available Monday to Friday, ${pad(BUSINESS_HOURS.start)}:00 to ${pad(BUSINESS_HOURS.end)}:00.`,
    CANCEL_HINT,
    '',
    STEP_HINTS.name,
  ].join('\n');
}

export function buildNameStepResponse(customerName: string): string {
  return `Thanks, ${escapeHtml(customerName)}! 👋\n\n${STEP_HINTS.contact}`;
}

export function buildContactStepResponse(contactInfo: string): string {
  return `✅ ${escapeHtml(formatContactDisplay(contactInfo))}\n\n${STEP_HINTS.datetime}`;
}

export function buildScheduleSummary(schedule: Schedule): string {
  return [
    '✅ <b>Consultation requested!</b>',
    '',
    `📋 <b>Request ID:</b> #${schedule.id}`,
    `👤 <b>Name:</b> ${escapeHtml(schedule.customerName)}`,
    `<b>Contact:</b> ${escapeHtml(formatContactDisplay(schedule.contactInfo))}`,
    `🗓️ <b>Preferred time:</b> ${escapeHtml(schedule.preferredDatetime)}`,
    '',
    "We'll confirm the time with you shortly.",
  ].join('\n');
}
