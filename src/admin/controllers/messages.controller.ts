import { Body, Controller, Get, Param, ParseIntPipe, Patch, Query, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { MessagesService } from 'src/crm/services/messages.service';
import { MessageListQueryDto, RespondMessageDto } from '../dto/requests.dto';
import { MessageResponseRto, MessageRto } from '../rto/requests.rto';
import { MessageResponsesService } from '../services/message-responses.service';

@ApiTags('admin: messages')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/messages')
export class MessagesController {
  constructor(
    private readonly messagesService: MessagesService,
    private readonly messageResponsesService: MessageResponsesService,
  ) {}

  @Get()
  @ApiSuccessResponse(MessageRto, { isArray: true })
  async list(@Query() query: MessageListQueryDto): Promise<SuccessResponseRto<MessageRto[]>> {
    return success(await this.messagesService.list(query));
  }

  @Get(':id')
  @ApiSuccessResponse(MessageRto)
  @ApiNotFoundResponse()
  async get(@Param('id', ParseIntPipe) id: number): Promise<SuccessResponseRto<MessageRto>> {
    return success(await this.messagesService.findById(id));
  }

  @Patch(':id')
  @ApiSuccessResponse(MessageResponseRto)
  async respond(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: RespondMessageDto,
  ): Promise<SuccessResponseRto<MessageResponseRto>> {
    return success(await this.messageResponsesService.respond(id, dto.status, dto.response));
  }
}
