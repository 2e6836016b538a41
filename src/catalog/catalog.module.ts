import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PrintService } from '@common/entities/print-service.entity';
import { Product } from '@common/entities/product.entity';
import { Setting } from '@common/entities/setting.entity';
import { PrintServicesService } from './services/print-services.service';
import { ProductsService } from './services/products.service';
import { SettingsService } from './services/settings.service';
import { CatalogSeedService } from './services/catalog-seed.service';

@Module({
  imports: [TypeOrmModule.forFeature([PrintService, Product, Setting])],
  providers: [PrintServicesService, ProductsService, SettingsService, CatalogSeedService],
  exports: [PrintServicesService, ProductsService, SettingsService],
})
export class CatalogModule {}
