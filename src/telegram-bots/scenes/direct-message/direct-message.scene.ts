import { Logger } from '@nestjs/common';
import { validateContactInfo, validateMessageText, validateName } from '@shared/validators/input.validators';
import { MessagesService } from 'src/crm/services/messages.service';
import type { NewCustomerMessage } from 'src/crm/interfaces/customer-request.interface';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import type { ConversationScene, SceneContext, SceneHandleResult } from '../common/types';
import { buildSaveFailedReply, repeatStep } from '../common/utils';
import {
  STEP_HINTS,
  buildContactStepResponse,
  buildIntroMessage,
  buildMessageReceipt,
  buildNameStepResponse,
} from './messages';
import type { MessageState } from './types';

export class DirectMessageScene implements ConversationScene<MessageState> {
  private readonly logger = new Logger(DirectMessageScene.name);

  constructor(
    private readonly messagesService: MessagesService,
    private readonly notificationsService: NotificationsService,
  ) {}

  getInitialState(): MessageState {
    return { step: 'name', data: {} };
  }

  start(): SceneHandleResult<MessageState> {
    return {
      state: this.getInitialState(),
      responses: [{ text: buildIntroMessage(), markup: { type: 'remove' } }],
      completed: false,
    };
  }

  async handleMessage(
    state: MessageState,
    rawMessage: string,
    context: SceneContext,
  ): Promise<SceneHandleResult<MessageState>> {
    switch (state.step) {
      case 'name': {
        const result = validateName(rawMessage);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.name);
        return {
          state: { step: 'contact', data: { ...state.data, customerName: result.value } },
          responses: [{ text: buildNameStepResponse(result.value) }],
          completed: false,
        };
      }

      case 'contact': {
        const result = validateContactInfo(rawMessage);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.contact);
        return {
          state: { step: 'text', data: { ...state.data, contactInfo: result.value } },
          responses: [{ text: buildContactStepResponse() }],
          completed: false,
        };
      }

      case 'text': {
        const result = validateMessageText(rawMessage);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.text);
        const { customerName, contactInfo } = state.data;
        if (!customerName || !contactInfo) {
          this.logger.warn('Message session was missing collected fields, flow abandoned');
          return { state, responses: [buildSaveFailedReply('message')], completed: true };
        }
        return this.complete(state, {
          customerName,
          contactInfo,
          messageText: result.value,
          telegramUserId: context.chatId,
        });
      }
    }
  }

  private async complete(state: MessageState, input: NewCustomerMessage): Promise<SceneHandleResult<MessageState>> {
    try {
      const message = await this.messagesService.create(input);
      void this.notificationsService.notifyNewMessage(message);
      return {
        state,
        responses: [{ text: buildMessageReceipt(message), markup: { type: 'main_menu' } }],
        completed: true,
      };
    } catch (error) {
      this.logger.error(
        `Failed to save message for chat ${input.telegramUserId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return { state, responses: [buildSaveFailedReply('message')], completed: true };
    }
  }
}
