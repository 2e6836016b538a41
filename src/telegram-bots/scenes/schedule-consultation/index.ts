export { ScheduleConsultationScene } from './schedule-consultation.scene';
export { SCHEDULE_STEPS } from './types';
export type { ScheduleState, ScheduleStep } from './types';
