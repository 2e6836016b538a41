import { Logger } from '@nestjs/common';
import {
  resolveServiceChoice,
  validateCompanyName,
  validateContactInfo,
  validateDeliveryDate,
  validateName,
  validateQuantity,
} from '@shared/validators/input.validators';
import { isSkipAnswer } from '@shared/helpers/text.helper';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { OrdersService } from 'src/crm/services/orders.service';
import type { NewOrder } from 'src/crm/interfaces/customer-request.interface';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import type { ConversationScene, SceneContext, SceneHandleResult } from '../common/types';
import { buildSaveFailedReply, repeatStep } from '../common/utils';
import { MIN_FREE_TEXT_SERVICE_LENGTH, STEP_HINTS } from './constants';
import {
  buildDeliveryDateStepResponse,
  buildIntroMessage,
  buildNameStepResponse,
  buildOrderSummary,
  buildQuantityStepResponse,
  buildServiceListMessage,
  buildServiceStepResponse,
} from './messages';
import type { OrderState, OrderStateData, ServiceOption } from './types';

export class PlaceOrderScene implements ConversationScene<OrderState> {
  private readonly logger = new Logger(PlaceOrderScene.name);

  constructor(
    private readonly printServicesService: PrintServicesService,
    private readonly ordersService: OrdersService,
    private readonly notificationsService: NotificationsService,
  ) {}

  getInitialState(): OrderState {
    return { step: 'name', data: {} };
  }

  start(): SceneHandleResult<OrderState> {
    return {
      state: this.getInitialState(),
      responses: [{ text: buildIntroMessage(), markup: { type: 'remove' } }],
      completed: false,
    };
  }

  async handleMessage(state: OrderState, rawMessage: string, context: SceneContext): Promise<SceneHandleResult<OrderState>> {
    const message = rawMessage.trim();
    const data: OrderStateData = { ...state.data };

    switch (state.step) {
      case 'name': {
        const result = validateName(message);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.name);
        data.customerName = result.value;
        return this.advance('company', data, buildNameStepResponse(result.value));
      }

      case 'company': {
        let companyName: string | null = null;
        if (!isSkipAnswer(message)) {
          const result = validateCompanyName(message);
          if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.company);
          companyName = result.value || null;
        }
        data.companyName = companyName;
        data.serviceOptions = await this.loadServiceOptions();
        return this.advance('service', data, buildServiceListMessage(companyName, data.serviceOptions));
      }

      case 'service': {
        const options = data.serviceOptions ?? [];
        if (!options.length) {
          if (message.length < MIN_FREE_TEXT_SERVICE_LENGTH) {
            return repeatStep(state, 'Please describe what you would like printed', STEP_HINTS.service);
          }
          data.productType = message;
          data.serviceId = null;
          return this.advance('quantity', data, buildServiceStepResponse(message));
        }

        const result = resolveServiceChoice(
          message,
          options.map((option) => option.name),
        );
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.service);
        const chosen = options.find((option) => option.name === result.value);
        data.productType = result.value;
        data.serviceId = chosen?.id ?? null;
        return this.advance('quantity', data, buildServiceStepResponse(result.value));
      }

      case 'quantity': {
        const result = validateQuantity(message);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.quantity);
        data.quantity = result.value;
        return this.advance('delivery_date', data, buildQuantityStepResponse(result.value));
      }

      case 'delivery_date': {
        const result = validateDeliveryDate(message, context.now);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.delivery_date);
        data.deliveryDate = result.value;
        return this.advance('contact', data, buildDeliveryDateStepResponse(result.value));
      }

      case 'contact': {
        const result = validateContactInfo(message);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.contact);
        return this.complete(state, this.toNewOrder(data, result.value, context.chatId));
      }
    }
  }

  private advance(step: OrderState['step'], data: OrderStateData, text: string): SceneHandleResult<OrderState> {
    return { state: { step, data }, responses: [{ text }], completed: false };
  }

  private async loadServiceOptions(): Promise<ServiceOption[]> {
    const services = await this.printServicesService.listActive();
    return services.map((service) => ({ id: service.id, name: service.name }));
  }

  private toNewOrder(data: OrderStateData, contactInfo: string, chatId: string): NewOrder | null {
    const { customerName, productType, quantity, deliveryDate } = data;
    if (!customerName || !productType || quantity === undefined || !deliveryDate) {
      return null;
    }
    return {
      customerName,
      companyName: data.companyName ?? null,
      productType,
      serviceId: data.serviceId ?? null,
      quantity,
      deliveryDate,
      contactInfo,
      telegramUserId: chatId,
    };
  }

  private async complete(state: OrderState, input: NewOrder | null): Promise<SceneHandleResult<OrderState>> {
    if (!input) {
      this.logger.warn('Order session was missing collected fields, flow abandoned');
      return { state, responses: [buildSaveFailedReply('order')], completed: true };
    }

    try {
      const order = await this.ordersService.create(input);
      void this.notificationsService.notifyNewOrder(order);
      return {
        state,
        responses: [{ text: buildOrderSummary(order), markup: { type: 'main_menu' } }],
        completed: true,
      };
    } catch (error) {
      this.logger.error(
        `Failed to save order for chat ${input.telegramUserId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return { state, responses: [buildSaveFailedReply('order')], completed: true };
    }
  }
}
