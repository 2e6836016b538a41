import { Body, Controller, Get, Param, ParseIntPipe, Patch, Query, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiNotFoundResponse, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { OrdersService } from 'src/crm/services/orders.service';
import { OrderListQueryDto, UpdateOrderStatusDto } from '../dto/requests.dto';
import { OrderRto } from '../rto/requests.rto';

@ApiTags('admin: orders')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/orders')
export class OrdersController {
  constructor(private readonly ordersService: OrdersService) {}

  @Get()
  @ApiSuccessResponse(OrderRto, { isArray: true })
  async list(@Query() query: OrderListQueryDto): Promise<SuccessResponseRto<OrderRto[]>> {
    return success(await this.ordersService.list(query));
  }

  @Get(':id')
  @ApiSuccessResponse(OrderRto)
  @ApiNotFoundResponse()
  async get(@Param('id', ParseIntPipe) id: number): Promise<SuccessResponseRto<OrderRto>> {
    return success(await this.ordersService.findById(id));
  }

  @Patch(':id/status')
  @ApiSuccessResponse(OrderRto)
  async updateStatus(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateOrderStatusDto,
  ): Promise<SuccessResponseRto<OrderRto>> {
    return success(await this.ordersService.updateStatus(id, dto.status, dto.notes));
  }
}
