import { Body, Controller, Get, Param, ParseIntPipe, Patch, Query, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { SchedulesService } from 'src/crm/services/schedules.service';
import { ScheduleListQueryDto, UpdateScheduleStatusDto } from '../dto/requests.dto';
import { ScheduleRto } from '../rto/requests.rto';

@ApiTags('admin: schedules')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/schedules')
export class SchedulesController {
  constructor(private readonly schedulesService: SchedulesService) {}

  @Get()
  @ApiSuccessResponse(ScheduleRto, { isArray: true })
  async list(@Query() query: ScheduleListQueryDto): Promise<SuccessResponseRto<ScheduleRto[]>> {
    return success(await this.schedulesService.list(query));
  }

  @Get(':id')
  @ApiSuccessResponse(ScheduleRto)
  @ApiNotFoundResponse()
  async get(@Param('id', ParseIntPipe) id: number): Promise<SuccessResponseRto<ScheduleRto>> {
    return success(await this.schedulesService.findById(id));
  }

  @Patch(':id/status')
  @ApiSuccessResponse(ScheduleRto)
  async updateStatus(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateScheduleStatusDto,
  ): Promise<SuccessResponseRto<ScheduleRto>> {
    return success(await this.schedulesService.updateStatus(id, dto.status, dto.notes));
  }
}
