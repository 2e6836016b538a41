import { Controller, Get, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { DashboardRto } from '../rto/dashboard.rto';
import { DashboardService } from '../services/dashboard.service';

@ApiTags('admin: dashboard')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/dashboard')
export class DashboardController {
  constructor(private readonly dashboardService: DashboardService) {}

  @Get()
  @ApiSuccessResponse(DashboardRto)
  async overview(): Promise<SuccessResponseRto<DashboardRto>> {
    return success(await this.dashboardService.getOverview());
  }
}
