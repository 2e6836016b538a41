import { Logger } from '@nestjs/common';
import {
  validateContactInfo,
  validateDatetimePreference,
  validateName,
} from '@shared/validators/input.validators';
import { SchedulesService } from 'src/crm/services/schedules.service';
import type { NewSchedule } from 'src/crm/interfaces/customer-request.interface';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import type { ConversationScene, SceneContext, SceneHandleResult } from '../common/types';
import { buildSaveFailedReply, repeatStep } from '../common/utils';
import { STEP_HINTS } from './constants';
import { buildContactStepResponse, buildIntroMessage, buildNameStepResponse, buildScheduleSummary } from './messages';
import type { ScheduleState } from './types';

export class ScheduleConsultationScene implements ConversationScene<ScheduleState> {
  private readonly logger = new Logger(ScheduleConsultationScene.name);

  constructor(
    private readonly schedulesService: SchedulesService,
    private readonly notificationsService: NotificationsService,
  ) {}

  getInitialState(): ScheduleState {
    return { step: 'name', data: {} };
  }

  start(): SceneHandleResult<ScheduleState> {
    return {
      state: this.getInitialState(),
      responses: [{ text: buildIntroMessage(), markup: { type: 'remove' } }],
      completed: false,
    };
  }

  async handleMessage(
    state: ScheduleState,
    rawMessage: string,
    context: SceneContext,
  ): Promise<SceneHandleResult<ScheduleState>> {
    const message = rawMessage.trim();

    switch (state.step) {
      case 'name': {
        const result = validateName(message);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.name);
        return {
          state: { step: 'contact', data: { ...state.data, customerName: result.value } },
          responses: [{ text: buildNameStepResponse(result.value) }],
          completed: false,
        };
      }

      case 'contact': {
        const result = validateContactInfo(message);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.contact);
        return {
          state: { step: 'datetime', data: { ...state.data, contactInfo: result.value } },
          responses: [{ text: buildContactStepResponse(result.value) }],
          completed: false,
        };
      }

      case 'datetime': {
        const result = validateDatetimePreference(message, context.now);
        if (!result.ok) return repeatStep(state, result.error, STEP_HINTS.datetime);
        const { customerName, contactInfo } = state.data;
        if (!customerName || !contactInfo) {
          this.logger.warn('Schedule session was missing collected fields, flow abandoned');
          return { state, responses: [buildSaveFailedReply('request')], completed: true };
        }
        return this.complete(state, {
          customerName,
          contactInfo,
          preferredDatetime: result.value,
          telegramUserId: context.chatId,
        });
      }
    }
  }

  private async complete(state: ScheduleState, input: NewSchedule): Promise<SceneHandleResult<ScheduleState>> {
    try {
      const schedule = await this.schedulesService.create(input);
      void this.notificationsService.notifyNewSchedule(schedule);
      return {
        state,
        responses: [{ text: buildScheduleSummary(schedule), markup: { type: 'main_menu' } }],
        completed: true,
      };
    } catch (error) {
      this.logger.error(
        `Failed to save consultation for chat ${input.telegramUserId}`,
        error instanceof Error ? error.stack : String(error),
      );
      return { state, responses: [buildSaveFailedReply('request')], completed: true };
    }
  }
}
