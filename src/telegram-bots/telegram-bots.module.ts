import { Module } from '@nestjs/common';
import { TelegrafModule } from 'nestjs-telegraf';
import { cfg } from '@common/config/config.service';
import { RedisModule } from '@infra/redis/redis.module';
import { CatalogModule } from 'src/catalog/catalog.module';
import { CrmModule } from 'src/crm/crm.module';
import { NotificationsModule } from 'src/notifications/notifications.module';
import { TelegramBotsService } from './telegram-bots.service';
import { TelegramBotsUpdate } from './telegram-bots.update';

@Module({
  imports: [
    TelegrafModule.forRootAsync({
      useFactory: () => {
        const { token, webhookDomain } = cfg.telegram;
        if (!token) {
          throw new Error('BOT_TOKEN is required to run the bot');
        }
        return {
          token,
          // In webhook mode main.ts mounts the callback on the HTTP server instead of polling.
          launchOptions: webhookDomain ? false : { dropPendingUpdates: true },
        };
      },
    }),
    RedisModule,
    CatalogModule,
    CrmModule,
    NotificationsModule,
  ],
  providers: [TelegramBotsService, TelegramBotsUpdate],
  exports: [TelegramBotsService],
})
export class TelegramBotsModule {}
