import 'reflect-metadata';
import { Logger, ValidationPipe } from '@nestjs/common';
import { NestFactory } from '@nestjs/core';
import { NestExpressApplication } from '@nestjs/platform-express';
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger';
import cookieParser from 'cookie-parser';
import helmet from 'helmet';
import { getBotToken } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';
import { cfg } from '@common/config/config.service';
import { AppModule } from './app.module';

const logger = new Logger('Bootstrap');

function webhookUrl(domain: string, path: string): string {
  const base = /^https?:\/\//.test(domain) ? domain : `https://${domain}`;
  return `${base.replace(/\/+$/, '')}${path}`;
}

async function bootstrap() {
  const { mode, port } = cfg.app;
  const app = await NestFactory.create<NestExpressApplication>(AppModule.register(mode));

  app.use(helmet());
  app.use(cookieParser());
  app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
  app.enableShutdownHooks();

  if (mode !== 'bot') {
    const swaggerConfig = new DocumentBuilder()
      .setTitle(`${cfg.business.name} API`)
      .setDescription('Admin dashboard and public catalog')
      .addCookieAuth(cfg.admin.cookieName)
      .build();
    SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swaggerConfig));
  }

  const { webhookDomain, webhookPath } = cfg.telegram;
  if (mode !== 'web' && webhookDomain) {
    const bot = app.get<Telegraf>(getBotToken());
    app.use(bot.webhookCallback(webhookPath));
    await bot.telegram.setWebhook(webhookUrl(webhookDomain, webhookPath));
    logger.log(`Telegram webhook registered at ${webhookPath}`);
  }

  await app.listen(port);
  logger.log(`Running in "${mode}" mode on port ${port}`);
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start', error instanceof Error ? error.stack : String(error));
  process.exit(1);
});
