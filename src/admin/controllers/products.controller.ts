import { Body, Controller, Delete, HttpCode, HttpStatus, Param, ParseIntPipe, Put, UseGuards } from '@nestjs/common';
import { ApiCookieAuth, ApiTags } from '@nestjs/swagger';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { ApiSuccessResponse } from '@shared/decorators/api-success-response.decorator';
import { success, SuccessResponseRto } from '@shared/response.rto';
import { ProductsService } from 'src/catalog/services/products.service';
import { UpdateProductDto } from '../dto/product.dto';
import { ProductRto } from '../rto/catalog.rto';

@ApiTags('admin: products')
@ApiCookieAuth()
@UseGuards(AdminSessionGuard)
@Controller('admin/products')
export class ProductsController {
  constructor(private readonly productsService: ProductsService) {}

  @Put(':id')
  @ApiSuccessResponse(ProductRto)
  async update(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateProductDto,
  ): Promise<SuccessResponseRto<ProductRto>> {
    return success(await this.productsService.update(id, dto));
  }

  @Delete(':id')
  @HttpCode(HttpStatus.NO_CONTENT)
  async remove(@Param('id', ParseIntPipe) id: number): Promise<void> {
    await this.productsService.remove(id);
  }
}
