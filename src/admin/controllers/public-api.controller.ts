import { Body, Controller, Get, NotFoundException, Param, ParseIntPipe, Post } from '@nestjs/common';
import { ApiBadRequestResponse, ApiCreatedResponse, ApiNotFoundResponse, ApiOperation, ApiTags } from '@nestjs/swagger';
import { Throttle } from '@nestjs/throttler';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { ProductsService } from 'src/catalog/services/products.service';
import { SettingsService } from 'src/catalog/services/settings.service';
import { SubmitMessageDto, SubmitOrderDto, SubmitScheduleDto } from '../dto/submission.dto';
import { ProductRto, ServiceRto, SettingRto } from '../rto/catalog.rto';
import { SubmissionRto } from '../rto/requests.rto';
import { PublicSubmissionsService } from '../services/public-submissions.service';

/** Catalog and form submissions for the website; only active services and products are listed. */
@ApiTags('public')
@Controller('api')
export class PublicApiController {
  constructor(
    private readonly printServicesService: PrintServicesService,
    private readonly productsService: ProductsService,
    private readonly settingsService: SettingsService,
    private readonly publicSubmissionsService: PublicSubmissionsService,
  ) {}

  @Get('services')
  @ApiSuccessResponse(ServiceRto, { isArray: true })
  async services(): Promise<SuccessResponseRto<ServiceRto[]>> {
    return success(await this.printServicesService.listActive());
  }

  @Get('products/:serviceId')
  @ApiSuccessResponse(ProductRto, { isArray: true })
  async products(@Param('serviceId', ParseIntPipe) serviceId: number): Promise<SuccessResponseRto<ProductRto[]>> {
    return success(await this.productsService.listByService(serviceId, { activeOnly: true }));
  }

  @Get('settings/:key')
  @ApiSuccessResponse(SettingRto)
  @ApiNotFoundResponse({ description: 'Unknown setting' })
  async setting(@Param('key') key: string): Promise<SuccessResponseRto<SettingRto>> {
    const setting = await this.settingsService.get(key);
    if (!setting) {
      throw new NotFoundException(`Setting "${key}" not found`);
    }
    return success(setting);
  }

  @Post('order')
  @Throttle({ short: { ttl: 60000, limit: 10 } })
  @ApiOperation({ summary: 'Place an order from the website form' })
  @ApiCreatedResponse({ type: SubmissionRto })
  @ApiBadRequestResponse({ description: 'A field failed validation' })
  async submitOrder(@Body() dto: SubmitOrderDto): Promise<SuccessResponseRto<SubmissionRto>> {
    return success(await this.publicSubmissionsService.submitOrder(dto));
  }

  @Post('schedule')
  @Throttle({ short: { ttl: 60000, limit: 10 } })
  @ApiOperation({ summary: 'Request a consultation from the website form' })
  @ApiCreatedResponse({ type: SubmissionRto })
  @ApiBadRequestResponse({ description: 'A field failed validation' })
  async submitSchedule(@Body() dto: SubmitScheduleDto): Promise<SuccessResponseRto<SubmissionRto>> {
    return success(await this.publicSubmissionsService.submitSchedule(dto));
  }

  @Post('message')
  @Throttle({ short: { ttl: 60000, limit: 10 } })
  @ApiOperation({ summary: 'Send a message from the website contact form' })
  @ApiCreatedResponse({ type: SubmissionRto })
  @ApiBadRequestResponse({ description: 'A field failed validation' })
  async submitMessage(@Body() dto: SubmitMessageDto): Promise<SuccessResponseRto<SubmissionRto>> {
    return success(await this.publicSubmissionsService.submitMessage(dto));
  }
}
