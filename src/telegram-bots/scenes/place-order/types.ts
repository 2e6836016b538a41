export const ORDER_STEPS = ['name', 'company', 'service', 'quantity', 'delivery_date', 'contact'] as const;

export type OrderStep = (typeof ORDER_STEPS)[number];

export interface ServiceOption {
  id: number | null;
  name: string;
}

export interface OrderStateData {
  customerName?: string;
  companyName?: string | null;
  /** The list shown to the customer, so a number always refers to what they saw. */
  serviceOptions?: ServiceOption[];
  productType?: string;
  serviceId?: number | null;
  quantity?: number;
  deliveryDate?: string;
}

export interface OrderState {
  step: OrderStep;
  data: OrderStateData;
}
