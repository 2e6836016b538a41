import { ApiProperty } from '@nestjs/swagger';
import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';

export class OrderRto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'John Doe' })
  customerName!: string;

  @ApiProperty({ type: String, nullable: true })
  companyName!: string | null;

  @ApiProperty({ example: 'Business Cards' })
  productType!: string;

  @ApiProperty({ type: Number, nullable: true })
  serviceId!: number | null;

  @ApiProperty({ example: 500 })
  quantity!: number;

  @ApiProperty({ example: '25/12/2030' })
  deliveryDate!: string;

  @ApiProperty({ example: 'test@example.com' })
  contactInfo!: string;

  @ApiProperty({ type: String, nullable: true })
  telegramUserId!: string | null;

  @ApiProperty({ enum: OrderStatus })
  status!: OrderStatus;

  @ApiProperty({ type: String, nullable: true })
  notes!: string | null;

  @ApiProperty()
  createdAt!: Date;
}

export class ScheduleRto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'Jane Roe' })
  customerName!: string;

  @ApiProperty({ example: '+1234567890' })
  contactInfo!: string;

  @ApiProperty({ example: '25/12/2030 14:30' })
  preferredDatetime!: string;

  @ApiProperty({ enum: ScheduleStatus })
  status!: ScheduleStatus;

  @ApiProperty({ type: String, nullable: true })
  telegramUserId!: string | null;

  @ApiProperty({ type: String, nullable: true })
  notes!: string | null;

  @ApiProperty()
  createdAt!: Date;
}

export class MessageRto {
  @ApiProperty({ example: 1 })
  id!: number;

  @ApiProperty({ example: 'Jane Roe' })
  customerName!: string;

  @ApiProperty({ example: 'jane@example.com' })
  contactInfo!: string;

  @ApiProperty({ example: 'Do you print on canvas?' })
  messageText!: string;

  @ApiProperty({ enum: MessageStatus })
  status!: MessageStatus;

  @ApiProperty({ type: String, nullable: true })
  response!: string | null;

  @ApiProperty({ type: String, nullable: true })
  telegramUserId!: string | null;

  @ApiProperty()
  createdAt!: Date;
}

export class MessageResponseRto {
  @ApiProperty({ type: MessageRto })
  message!: MessageRto;

  @ApiProperty({ description: 'Whether the response reached the customer on Telegram' })
  delivered!: boolean;
}

export class BroadcastResultRto {
  @ApiProperty()
  sent!: boolean;
}

export class SubmissionRto {
  @ApiProperty({ example: 12 })
  id!: number;

  @ApiProperty({ description: 'Whether the admin was notified on Telegram' })
  notified!: boolean;
}
