import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_GUARD } from '@nestjs/core';
import { ThrottlerModule } from '@nestjs/throttler';
import type { AppMode } from '@common/config/configs/app.config';
import { DatabaseModule } from '@infra/database/database.module';
import { HttpThrottlerGuard } from '@shared/guards/http-throttler.guard';
import { AdminModule } from './admin/admin.module';
import { CatalogModule } from './catalog/catalog.module';
import { CrmModule } from './crm/crm.module';
import { HealthModule } from './health/health.module';
import { NotificationsModule } from './notifications/notifications.module';
import { TelegramBotsModule } from './telegram-bots/telegram-bots.module';

@Module({})
export class AppModule {
  /** `web` serves the admin and public API, `bot` runs Telegram, `both` does both in one process. */
  static register(mode: AppMode): DynamicModule {
    const serveWeb = mode !== 'bot';
    const runBot = mode !== 'web';

    return {
      module: AppModule,
      imports: [
        ConfigModule.forRoot({ isGlobal: true }),
        ThrottlerModule.forRoot([{ name: 'short', ttl: 60000, limit: 100 }]),
        DatabaseModule,
        CatalogModule,
        CrmModule,
        NotificationsModule,
        HealthModule,
        ...(serveWeb ? [AdminModule] : []),
        ...(runBot ? [TelegramBotsModule] : []),
      ],
      providers: [{ provide: APP_GUARD, useClass: HttpThrottlerGuard }],
    };
  }
}
