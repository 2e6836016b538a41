import { Module } from '@nestjs/common';
import { CatalogModule } from 'src/catalog/catalog.module';
import { NotificationsService } from './services/notifications.service';

@Module({
  imports: [CatalogModule],
  providers: [NotificationsService],
  exports: [NotificationsService],
})
export class NotificationsModule {}
