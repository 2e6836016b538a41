import { Body, Controller, Get, Put, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { SettingsService } from 'src/catalog/services/settings.service';
import { UpdateSettingsDto } from '../dto/settings.dto';
import { SettingRto } from '../rto/catalog.rto';

@ApiTags('admin: settings')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/settings')
export class SettingsController {
  constructor(private readonly settingsService: SettingsService) {}

  @Get()
  @ApiSuccessResponse(SettingRto, { isArray: true })
  async list(): Promise<SuccessResponseRto<SettingRto[]>> {
    return success(await this.settingsService.list());
  }

  @Put()
  @ApiSuccessResponse(SettingRto, { isArray: true })
  async update(@Body() dto: UpdateSettingsDto): Promise<SuccessResponseRto<SettingRto[]>> {
    return success(await this.settingsService.upsertMany(dto.settings));
  }
}
