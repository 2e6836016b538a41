import fetch from 'node-fetch';
import { Injectable, Logger } from '@nestjs/common';
import { cfg } from '@common/config/config.service';
import { CustomerMessage } from '@common/entities/customer-message.entity';
import { Order } from '@common/entities/order.entity';
import { Schedule } from '@common/entities/schedule.entity';
import { SettingsService } from 'src/catalog/services/settings.service';
import { SETTING_KEYS } from 'src/catalog/constants/default-catalog';
import type { TelegramProfile } from 'src/crm/interfaces/customer-request.interface';
import {
  buildBroadcast,
  buildCustomerReply,
  buildForwardedMessage,
  buildNewMessageNotification,
  buildNewOrderNotification,
  buildNewScheduleNotification,
} from '../templates/notification.templates';

/**
 * Sends HTML messages through the Bot API. Every method resolves to whether the
 * message was accepted; failures are logged and never retried.
 */
@Injectable()
export class NotificationsService {
  private readonly logger = new Logger(NotificationsService.name);

  constructor(private readonly settingsService: SettingsService) {}

  async sendToChat(chatId: string, text: string): Promise<boolean> {
    const { token, apiUrl } = cfg.telegram;
    if (!token) {
      this.logger.warn('BOT_TOKEN is not configured, message not sent');
      return false;
    }

    try {
      const response = await fetch(`${apiUrl}/bot${token}/sendMessage`, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ chat_id: chatId, text, parse_mode: 'HTML' }),
      });

      if (!response.ok) {
        const body = await response.text();
        this.logger.error(`Telegram API rejected message to ${chatId}: ${response.status} ${body}`);
        return false;
      }
      return true;
    } catch (error) {
      this.logger.error(`Failed to send message to ${chatId}`, error instanceof Error ? error.stack : String(error));
      return false;
    }
  }

  async sendToAdmin(text: string): Promise<boolean> {
    const { adminChatId } = cfg.telegram;
    if (!adminChatId) {
      this.logger.warn('ADMIN_CHAT_ID is not configured, admin notification skipped');
      return false;
    }
    if (!(await this.adminNotificationsEnabled())) {
      this.logger.log('Admin notifications are disabled in settings');
      return false;
    }
    return this.sendToChat(adminChatId, text);
  }

  async sendToChannel(text: string): Promise<boolean> {
    const { channelUsername } = cfg.telegram;
    if (!channelUsername) {
      this.logger.warn('CHANNEL_USERNAME is not configured, broadcast skipped');
      return false;
    }
    const chatId = channelUsername.startsWith('@') ? channelUsername : `@${channelUsername}`;
    return this.sendToChat(chatId, text);
  }

  async notifyNewOrder(order: Order): Promise<boolean> {
    return this.sendToAdmin(buildNewOrderNotification(order));
  }

  async notifyNewSchedule(schedule: Schedule): Promise<boolean> {
    return this.sendToAdmin(buildNewScheduleNotification(schedule));
  }

  async notifyNewMessage(message: CustomerMessage): Promise<boolean> {
    return this.sendToAdmin(buildNewMessageNotification(message));
  }

  async forwardToAdmin(profile: TelegramProfile, chatId: string, text: string): Promise<boolean> {
    return this.sendToAdmin(buildForwardedMessage(profile, chatId, text));
  }

  async replyToCustomer(chatId: string, text: string): Promise<boolean> {
    return this.sendToChat(chatId, buildCustomerReply(cfg.business.name, text));
  }

  async broadcastToChannel(title: string, content: string, includeBusinessInfo = true): Promise<boolean> {
    return this.sendToChannel(buildBroadcast(title, content, includeBusinessInfo ? cfg.business : undefined));
  }

  private async adminNotificationsEnabled(): Promise<boolean> {
    try {
      return await this.settingsService.getBoolean(SETTING_KEYS.adminNotifications, true);
    } catch (error) {
      this.logger.warn(`Could not read ${SETTING_KEYS.adminNotifications}, sending anyway: ${String(error)}`);
      return true;
    }
  }
}
