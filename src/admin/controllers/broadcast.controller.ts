import { Body, Controller, HttpCode, HttpStatus, Post, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import { BroadcastDto } from '../dto/broadcast.dto';
import { BroadcastResultRto } from '../rto/requests.rto';

@ApiTags('admin: broadcast')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/broadcast')
export class BroadcastController {
  constructor(private readonly notificationsService: NotificationsService) {}

  @Post()
  @HttpCode(HttpStatus.OK)
  @ApiSuccessResponse(BroadcastResultRto)
  async broadcast(@Body() dto: BroadcastDto): Promise<SuccessResponseRto<BroadcastResultRto>> {
    const sent = await this.notificationsService.broadcastToChannel(
      dto.title,
      dto.content,
      dto.includeBusinessInfo ?? true,
    );
    return success({ sent });
  }
}
