import type { OrderStep } from './types';

export const STEP_HINTS: Record<OrderStep, string> = {
  name: "👤 What's your full name?",
  company: "🏢 What's your company name? Type <b>skip</b> for a personal order.",
  service: '🖨️ Reply with the number or the name of the service you need.',
  quantity: '🔢 How many do you need? Enter a whole number from 1 to 100,000.',
  delivery_date: '📅 When do you need it? Use <b>DD/MM/YYYY</b>, e.g. 25/12/2030.',
  contact: '📞 Send a phone number or an email address we can reach you on.',
};

export const MIN_FREE_TEXT_SERVICE_LENGTH = 2;
