import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';

export interface TelegramProfile {
  id: string;
  username?: string;
  firstName?: string;
  lastName?: string;
}

export interface NewOrder {
  customerName: string;
  companyName: string | null;
  productType: string;
  serviceId: number | null;
  quantity: number;
  deliveryDate: string;
  contactInfo: string;
  telegramUserId: string | null;
  notes?: string | null;
}

export interface NewSchedule {
  customerName: string;
  contactInfo: string;
  preferredDatetime: string;
  telegramUserId: string | null;
  notes?: string | null;
}

export interface NewCustomerMessage {
  customerName: string;
  contactInfo: string;
  messageText: string;
  telegramUserId: string | null;
}

export interface ListFilter<TStatus> {
  status?: TStatus;
  limit?: number;
}

export type OrderFilter = ListFilter<OrderStatus>;
export type ScheduleFilter = ListFilter<ScheduleStatus>;
export type MessageFilter = ListFilter<MessageStatus>;
