export { PlaceOrderScene } from './place-order.scene';
export { ORDER_STEPS } from './types';
export type { OrderState, OrderStateData, OrderStep, ServiceOption } from './types';
