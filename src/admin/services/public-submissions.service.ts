import { BadRequestException, Injectable, Logger } from '@nestjs/common';
import {
  validateCompanyName,
  validateContactInfo,
  validateDatetimePreference,
  validateDeliveryDate,
  validateMessageText,
  validateName,
  validateQuantity,
} from '@shared/validators/input.validators';
import type { ValidationResult } from '@shared/validators/input.validators';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { MessagesService } from 'src/crm/services/messages.service';
import { OrdersService } from 'src/crm/services/orders.service';
import { SchedulesService } from 'src/crm/services/schedules.service';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import { SubmitMessageDto, SubmitOrderDto, SubmitScheduleDto } from '../dto/submission.dto';
import { SubmissionRto } from '../rto/requests.rto';

function accept<T>(result: ValidationResult<T>): T {
  if (!result.ok) {
    throw new BadRequestException(result.error);
  }
  return result.value;
}

/** Website forms: the same normalisation as the bot conversations, then one record and one admin notification. */
@Injectable()
export class PublicSubmissionsService {
  private readonly logger = new Logger(PublicSubmissionsService.name);

  constructor(
    private readonly printServicesService: PrintServicesService,
    private readonly ordersService: OrdersService,
    private readonly schedulesService: SchedulesService,
    private readonly messagesService: MessagesService,
    private readonly notificationsService: NotificationsService,
  ) {}

  async submitOrder(dto: SubmitOrderDto): Promise<SubmissionRto> {
    const productType = dto.productType.trim();
    const service = await this.printServicesService.findByName(productType);

    const order = await this.ordersService.create({
      customerName: accept(validateName(dto.name)),
      companyName: accept(validateCompanyName(dto.company ?? '')) || null,
      productType,
      serviceId: service?.isActive ? service.id : null,
      quantity: accept(validateQuantity(dto.quantity)),
      deliveryDate: accept(validateDeliveryDate(dto.deliveryDate)),
      contactInfo: accept(validateContactInfo(dto.contact)),
      telegramUserId: null,
      notes: dto.notes?.trim() || null,
    });
    this.logger.log(`Order #${order.id} submitted from the website`);

    return { id: order.id, notified: await this.notificationsService.notifyNewOrder(order) };
  }

  async submitSchedule(dto: SubmitScheduleDto): Promise<SubmissionRto> {
    const schedule = await this.schedulesService.create({
      customerName: accept(validateName(dto.name)),
      contactInfo: accept(validateContactInfo(dto.contact)),
      preferredDatetime: accept(validateDatetimePreference(dto.preferredDatetime)),
      telegramUserId: null,
      notes: dto.notes?.trim() || null,
    });
    this.logger.log(`Consultation #${schedule.id} requested from the website`);

    return { id: schedule.id, notified: await this.notificationsService.notifyNewSchedule(schedule) };
  }

  async submitMessage(dto: SubmitMessageDto): Promise<SubmissionRto> {
    const message = await this.messagesService.create({
      customerName: accept(validateName(dto.name)),
      contactInfo: accept(validateContactInfo(dto.contact)),
      messageText: accept(validateMessageText(dto.message)),
      telegramUserId: null,
    });
    this.logger.log(`Message #${message.id} sent from the website`);

    return { id: message.id, notified: await this.notificationsService.notifyNewMessage(message) };
  }
}
