import type { ScheduleStep } from './types';

export const STEP_HINTS: Record<ScheduleStep, string> = {
  name: "👤 What's your full name?",
  contact: '📞 Send a phone number or an email address we can reach you on.',
  datetime:
    '🗓️ When would suit you? Use <b>DD/MM/YYYY HH:MM</b> (e.g. 25/12/2030 14:30) or describe it, like "next Monday afternoon".',
};
