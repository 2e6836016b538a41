import { Body, Controller, Delete, Get, HttpCode, HttpStatus, Param, ParseIntPipe, Post, Put, UseGuards } from '@nestjs/common';
import { ApiConflictResponse, ApiCookieAuth, ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { ProductsService } from 'src/catalog/services/products.service';
import { CreateProductDto } from '../dto/product.dto';
import { CreateServiceDto, UpdateServiceDto } from '../dto/service.dto';
import { ProductRto, ServiceRto } from '../rto/catalog.rto';

@ApiTags('admin: services')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/services')
export class ServicesController {
  constructor(
    private readonly printServicesService: PrintServicesService,
    private readonly productsService: ProductsService,
  ) {}

  @Get()
  @ApiSuccessResponse(ServiceRto, { isArray: true })
  async list(): Promise<SuccessResponseRto<ServiceRto[]>> {
    return success(await this.printServicesService.listAll());
  }

  @Post()
  @ApiSuccessResponse(ServiceRto)
  @ApiConflictResponse({ description: 'A service with this name exists' })
  async create(@Body() dto: CreateServiceDto): Promise<SuccessResponseRto<ServiceRto>> {
    return success(await this.printServicesService.create(dto));
  }

  @Get(':id')
  @ApiSuccessResponse(ServiceRto)
  @ApiNotFoundResponse()
  async get(@Param('id', ParseIntPipe) id: number): Promise<SuccessResponseRto<ServiceRto>> {
    return success(await this.printServicesService.findById(id));
  }

  @Put(':id')
  @ApiSuccessResponse(ServiceRto)
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateServiceDto,
  ): Promise<SuccessResponseRto<ServiceRto>> {
    return success(await this.printServicesService.update(id, dto));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.printServicesService.remove(id);
  }

  @Get(':serviceId/products')
  @ApiSuccessResponse(ProductRto, { isArray: true })
  async listProducts(@Param('serviceId', ParseIntPipe) serviceId: number): Promise<SuccessResponseRto<ProductRto[]>> {
    await this.printServicesService.findById(serviceId);
    return success(await this.productsService.listByService(serviceId));
  }

  @Post(':serviceId/products')
  @ApiSuccessResponse(ProductRto)
  async createProduct(
    @Param('serviceId', ParseIntPipe) serviceId: number,
    @Body() dto: CreateProductDto,
  ): Promise<SuccessResponseRto<ProductRto>> {
    return success(await this.productsService.create(serviceId, dto));
  }
}
