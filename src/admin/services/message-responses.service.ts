import { Injectable, Logger } from '@nestjs/common';
import { MessageStatus } from '@common/enums/request-status.enum';
import { MessagesService } from 'src/crm/services/messages.service';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import { MessageResponseRto } from '../rto/requests.rto';

@Injectable()
export class MessageResponsesService {
  private readonly logger = new Logger(MessageResponsesService.name);

  constructor(
    private readonly messagesService: MessagesService,
    private readonly notificationsService: NotificationsService,
  ) {}

  /** Stores the new status and response; a non-empty response is also sent to the customer's chat. */
  async respond(id: number, status: MessageStatus, response?: string): Promise<MessageResponseRto> {
    const message = await this.messagesService.respond(id, status, response);
    const text = response?.trim();

    if (!text) {
      return { message, delivered: false };
    }
    if (!message.telegramUserId) {
      this.logger.warn(`Message #${id} has no Telegram chat, response stored only`);
      return { message, delivered: false };
    }

    const delivered = await this.notificationsService.replyToCustomer(message.telegramUserId, text);
    return { message, delivered };
  }
}
