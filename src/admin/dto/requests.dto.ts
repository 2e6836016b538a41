import { Type } from 'class-transformer';
import { IsEnum, IsInt, IsOptional, IsString, Max, MaxLength, Min } from 'class-validator';
import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';

class ListQueryDto {
  @ApiPropertyOptional({ example: 50, default: 100, maximum: 500 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  limit?: number;
}

export class OrderListQueryDto extends ListQueryDto {
  @ApiPropertyOptional({ enum: OrderStatus })
  @IsOptional()
  @IsEnum(OrderStatus)
  status?: OrderStatus;
}

export class ScheduleListQueryDto extends ListQueryDto {
  @ApiPropertyOptional({ enum: ScheduleStatus })
  @IsOptional()
  @IsEnum(ScheduleStatus)
  status?: ScheduleStatus;
}

export class MessageListQueryDto extends ListQueryDto {
  @ApiPropertyOptional({ enum: MessageStatus })
  @IsOptional()
  @IsEnum(MessageStatus)
  status?: MessageStatus;
}

export class UpdateOrderStatusDto {
  @ApiProperty({ enum: OrderStatus, example: OrderStatus.PROCESSING })
  @IsEnum(OrderStatus)
  status!: OrderStatus;

  @ApiPropertyOptional({ example: 'Proof approved by phone' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}

export class UpdateScheduleStatusDto {
  @ApiProperty({ enum: ScheduleStatus, example: ScheduleStatus.CONFIRMED })
  @IsEnum(ScheduleStatus)
  status!: ScheduleStatus;

  @ApiPropertyOptional({ example: 'Call moved to 15:00' })
  @IsOptional()
  @IsString()
  @MaxLength(2000)
  notes?: string;
}

export class RespondMessageDto {
  @ApiProperty({ enum: MessageStatus, example: MessageStatus.RESPONDED })
  @IsEnum(MessageStatus)
  status!: MessageStatus;

  @ApiPropertyOptional({ example: 'Yes, we print on recycled paper.' })
  @IsOptional()
  @IsString()
  @MaxLength(4000)
  response?: string;
}
