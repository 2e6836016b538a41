import { Injectable, Logger } from '@nestjs/common';
import { cfg } from '@common/config/config.service';
import { RedisService } from '@infra/redis/redis.service';
import { SETTING_KEYS } from 'src/catalog/constants/default-catalog';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { SettingsService } from 'src/catalog/services/settings.service';
import type { TelegramProfile } from 'src/crm/interfaces/customer-request.interface';
import { MessagesService } from 'src/crm/services/messages.service';
import { OrdersService } from 'src/crm/services/orders.service';
import { SchedulesService } from 'src/crm/services/schedules.service';
import { UsersService } from 'src/crm/services/users.service';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import type { BotReply, HandleMessageResponse } from './interfaces/bot-reply.interface';
import { assertNever, decodeAction, FLOWS } from './menu/actions';
import type { BotAction, FlowName } from './menu/actions';
import {
  ADMIN_ONLY,
  ADMIN_REPLY_USAGE,
  buildAdminFallbackHint,
  buildAdminReplyResult,
  buildChannelMessage,
  buildHelpMessage,
  buildServicesMessage,
  buildWelcomeMessage,
  CANCELLED_MESSAGES,
  CHANNEL_NOT_CONFIGURED,
  FORWARD_FAILED_REPLY,
  FORWARDED_REPLY,
  NOTHING_TO_CANCEL,
  UNKNOWN_CALLBACK_REPLY,
} from './menu/messages';
import type { SceneContext, SceneHandleResult } from './scenes/common/types';
import { isStepOf } from './scenes/common/utils';
import { DirectMessageScene, MESSAGE_STEPS } from './scenes/direct-message';
import type { MessageState } from './scenes/direct-message';
import { ORDER_STEPS, PlaceOrderScene } from './scenes/place-order';
import type { OrderState } from './scenes/place-order';
import { SCHEDULE_STEPS, ScheduleConsultationScene } from './scenes/schedule-consultation';
import type { ScheduleState } from './scenes/schedule-consultation';

export interface IncomingUpdate {
  chatId: string;
  from: TelegramProfile;
  text?: string;
  callbackData?: string;
}

export type ActiveFlow =
  | { flow: 'order'; state: OrderState }
  | { flow: 'schedule'; state: ScheduleState }
  | { flow: 'message'; state: MessageState };

export interface UserSessionState {
  activeFlow?: ActiveFlow;
}

const FLOW_STEPS: Record<FlowName, readonly string[]> = {
  order: ORDER_STEPS,
  schedule: SCHEDULE_STEPS,
  message: MESSAGE_STEPS,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isActiveFlow(value: unknown): value is ActiveFlow {
  if (!isRecord(value) || !isRecord(value.state) || !isRecord(value.state.data)) {
    return false;
  }
  const flow = value.flow;
  return isStepOf(FLOWS, flow) && isStepOf(FLOW_STEPS[flow], value.state.step);
}

@Injectable()
export class TelegramBotsService {
  private readonly logger = new Logger(TelegramBotsService.name);
  private readonly sessionKeyPrefix = 'print-bot:session:';

  private readonly orderScene: PlaceOrderScene;
  private readonly scheduleScene: ScheduleConsultationScene;
  private readonly messageScene: DirectMessageScene;

  constructor(
    private readonly redisService: RedisService,
    private readonly usersService: UsersService,
    private readonly printServicesService: PrintServicesService,
    private readonly settingsService: SettingsService,
    private readonly notificationsService: NotificationsService,
    ordersService: OrdersService,
    schedulesService: SchedulesService,
    messagesService: MessagesService,
  ) {
    this.orderScene = new PlaceOrderScene(printServicesService, ordersService, notificationsService);
    this.scheduleScene = new ScheduleConsultationScene(schedulesService, notificationsService);
    this.messageScene = new DirectMessageScene(messagesService, notificationsService);
  }

  async handleUpdate(update: IncomingUpdate): Promise<HandleMessageResponse> {
    const { chatId } = update;
    await this.trackUser(update.from);

    const session = await this.getSessionState(chatId);
    const action = decodeAction(update, { inFlow: session.activeFlow !== undefined });

    return this.dispatch(action, update, session);
  }

  private async dispatch(
    action: BotAction,
    update: IncomingUpdate,
    session: UserSessionState,
  ): Promise<HandleMessageResponse> {
    const { chatId } = update;

    switch (action.type) {
      case 'start':
        await this.clearSessionState(chatId);
        return this.reply({ text: await this.buildWelcome(), markup: { type: 'main_menu' } });

      case 'help':
        return this.reply({
          text: buildHelpMessage(),
          markup: session.activeFlow ? undefined : { type: 'main_menu' },
        });

      case 'cancel':
        if (!session.activeFlow) {
          return this.reply({ text: NOTHING_TO_CANCEL, markup: { type: 'main_menu' } });
        }
        await this.clearSessionState(chatId);
        this.logger.log(`Chat ${chatId} cancelled the ${session.activeFlow.flow} flow`);
        return this.reply({ text: CANCELLED_MESSAGES[session.activeFlow.flow], markup: { type: 'main_menu' } });

      case 'view_services': {
        const services = await this.printServicesService.listActive();
        return this.reply({
          text: buildServicesMessage(services),
          markup: services.length ? { type: 'flow_actions' } : undefined,
        });
      }

      case 'view_channel':
        return this.reply(this.buildChannelReply());

      case 'start_flow':
        return this.startFlow(chatId, action.flow);

      case 'admin_reply':
        return this.handleAdminReply(chatId, action.chatId, action.text);

      case 'text':
        if (session.activeFlow) {
          return this.continueFlow(chatId, session.activeFlow, action.text);
        }
        return this.handleFallback(update, action.text);

      case 'unknown_callback':
        this.logger.warn(`Unknown callback "${action.data}" from chat ${chatId}`);
        return this.reply({ text: UNKNOWN_CALLBACK_REPLY, markup: { type: 'main_menu' } });

      default:
        return assertNever(action);
    }
  }

  private async startFlow(chatId: string, flow: FlowName): Promise<HandleMessageResponse> {
    this.logger.log(`Chat ${chatId} started the ${flow} flow`);
    switch (flow) {
      case 'order':
        return this.applySceneResult(chatId, this.orderScene.start(), (state) => ({ flow: 'order', state }));
      case 'schedule':
        return this.applySceneResult(chatId, this.scheduleScene.start(), (state) => ({ flow: 'schedule', state }));
      case 'message':
        return this.applySceneResult(chatId, this.messageScene.start(), (state) => ({ flow: 'message', state }));
      default:
        return assertNever(flow);
    }
  }

  private async continueFlow(chatId: string, active: ActiveFlow, text: string): Promise<HandleMessageResponse> {
    const context: SceneContext = { chatId, now: new Date() };

    switch (active.flow) {
      case 'order':
        return this.applySceneResult(
          chatId,
          await this.orderScene.handleMessage(active.state, text, context),
          (state) => ({ flow: 'order', state }),
        );
      case 'schedule':
        return this.applySceneResult(
          chatId,
          await this.scheduleScene.handleMessage(active.state, text, context),
          (state) => ({ flow: 'schedule', state }),
        );
      case 'message':
        return this.applySceneResult(
          chatId,
          await this.messageScene.handleMessage(active.state, text, context),
          (state) => ({ flow: 'message', state }),
        );
      default:
        return assertNever(active);
    }
  }

  private async applySceneResult<TState>(
    chatId: string,
    result: SceneHandleResult<TState>,
    wrap: (state: TState) => ActiveFlow,
  ): Promise<HandleMessageResponse> {
    if (result.completed) {
      await this.clearSessionState(chatId);
    } else {
      await this.saveSessionState(chatId, { activeFlow: wrap(result.state) });
    }
    return { messages: result.responses };
  }

  private async handleAdminReply(senderChatId: string, targetChatId: string, text: string): Promise<HandleMessageResponse> {
    const { adminChatId } = cfg.telegram;
    if (!adminChatId || senderChatId !== adminChatId) {
      this.logger.warn(`Refused /reply from non-admin chat ${senderChatId}`);
      return this.reply({ text: ADMIN_ONLY });
    }
    if (!targetChatId || !text) {
      return this.reply({ text: ADMIN_REPLY_USAGE });
    }

    const delivered = await this.notificationsService.replyToCustomer(targetChatId, text);
    return this.reply({ text: buildAdminReplyResult(targetChatId, delivered) });
  }

  private async handleFallback(update: IncomingUpdate, text: string): Promise<HandleMessageResponse> {
    if (update.chatId === cfg.telegram.adminChatId) {
      return this.reply({ text: buildAdminFallbackHint() });
    }
    const forwarded = await this.notificationsService.forwardToAdmin(update.from, update.chatId, text);
    if (!forwarded) {
      this.logger.warn(`Could not forward a message from chat ${update.chatId} to the admin`);
      return this.reply({ text: FORWARD_FAILED_REPLY, markup: { type: 'main_menu' } });
    }
    return this.reply({ text: FORWARDED_REPLY, markup: { type: 'main_menu' } });
  }

  private async buildWelcome(): Promise<string> {
    const { name } = cfg.business;
    const fallback = `Your trusted printing partner at ${name}.`;
    try {
      const welcome = await this.settingsService.getValue(SETTING_KEYS.welcomeMessage, fallback);
      return buildWelcomeMessage(name, welcome);
    } catch (error) {
      this.logger.warn(`Could not read ${SETTING_KEYS.welcomeMessage}: ${String(error)}`);
      return buildWelcomeMessage(name, fallback);
    }
  }

  private buildChannelReply(): BotReply {
    const { channelUsername } = cfg.telegram;
    if (!channelUsername) {
      return { text: CHANNEL_NOT_CONFIGURED, markup: { type: 'main_menu' } };
    }
    const handle = channelUsername.replace(/^@/, '');
    return {
      text: buildChannelMessage(),
      markup: { type: 'link', label: `Open @${handle}`, url: `https://t.me/${handle}` },
    };
  }

  private reply(...messages: BotReply[]): HandleMessageResponse {
    return { messages };
  }

  private async trackUser(profile: TelegramProfile): Promise<void> {
    try {
      await this.usersService.touch(profile);
    } catch (error) {
      this.logger.warn(`Could not record activity for user ${profile.id}: ${String(error)}`);
    }
  }

  private getSessionKey(chatId: string): string {
    return `${this.sessionKeyPrefix}${chatId}`;
  }

  async getSessionState(chatId: string): Promise<UserSessionState> {
    const raw = await this.redisService.get(this.getSessionKey(chatId));
    if (!raw) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch {
      this.logger.warn(`Could not parse session for chat ${chatId}: ${raw}`);
      return {};
    }

    if (!isRecord(parsed) || parsed.activeFlow === undefined) {
      return {};
    }
    if (!isActiveFlow(parsed.activeFlow)) {
      this.logger.warn(`Discarding malformed session for chat ${chatId}`);
      return {};
    }
    return { activeFlow: parsed.activeFlow };
  }

  private async saveSessionState(chatId: string, state: UserSessionState): Promise<void> {
    await this.redisService.set(this.getSessionKey(chatId), JSON.stringify(state), {
      EX: cfg.telegram.sessionTtlSeconds,
    });
  }

  private async clearSessionState(chatId: string): Promise<void> {
    await this.redisService.delete(this.getSessionKey(chatId));
  }
}
