export const SCHEDULE_STEPS = ['name', 'contact', 'datetime'] as const;

export type ScheduleStep = (typeof SCHEDULE_STEPS)[number];

export interface ScheduleStateData {
  customerName?: string;
  contactInfo?: string;
}

export interface ScheduleState {
  step: ScheduleStep;
  data: ScheduleStateData;
}
