import { Module } from '@nestjs/common';
import { JwtModule } from '@nestjs/jwt';
import { cfg } from '@common/config/config.service';
import { AdminSessionGuard } from '@shared/guards/admin-session.guard';
import { CatalogModule } from 'src/catalog/catalog.module';
import { CrmModule } from 'src/crm/crm.module';
import { NotificationsModule } from 'src/notifications/notifications.module';
import { AuthController } from './controllers/auth.controller';
import { BroadcastController } from './controllers/broadcast.controller';
import { DashboardController } from './controllers/dashboard.controller';
import { MessagesController } from './controllers/messages.controller';
import { OrdersController } from './controllers/orders.controller';
import { ProductsController } from './controllers/products.controller';
import { PublicApiController } from './controllers/public-api.controller';
import { SchedulesController } from './controllers/schedules.controller';
import { ServicesController } from './controllers/services.controller';
import { SettingsController } from './controllers/settings.controller';
import { AdminAuthService } from './services/admin-auth.service';
import { DashboardService } from './services/dashboard.service';
import { MessageResponsesService } from './services/message-responses.service';
import { PublicSubmissionsService } from './services/public-submissions.service';

@Module({
  imports: [
    JwtModule.registerAsync({
      useFactory: () => ({
        secret: cfg.admin.secretKey,
        signOptions: { expiresIn: cfg.admin.sessionTtl },
      }),
    }),
    CatalogModule,
    CrmModule,
    NotificationsModule,
  ],
  controllers: [
    AuthController,
    DashboardController,
    ServicesController,
    ProductsController,
    SettingsController,
    OrdersController,
    SchedulesController,
    MessagesController,
    BroadcastController,
    PublicApiController,
  ],
  providers: [AdminAuthService, DashboardService, MessageResponsesService, PublicSubmissionsService, AdminSessionGuard],
})
export class AdminModule {}
