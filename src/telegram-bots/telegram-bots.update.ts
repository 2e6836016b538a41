import { Logger, UseFilters } from '@nestjs/common';
import { Command, Ctx, Help, On, Start, Update } from 'nestjs-telegraf';
import { Context } from 'telegraf';
import { BotExceptionFilter } from './filters/bot-exception.filter';
import { buildReplyExtra } from './menu/keyboards';
import { CANCEL_COMMANDS } from './menu/actions';
import { IncomingUpdate, TelegramBotsService } from './telegram-bots.service';

/**
 * Converts telegraf contexts into plain updates for {@link TelegramBotsService};
 * commands, menu text and inline buttons all go through the same router.
 */
@Update()
@UseFilters(BotExceptionFilter)
export class TelegramBotsUpdate {
  private readonly logger = new Logger(TelegramBotsUpdate.name);

  constructor(private readonly telegramBotsService: TelegramBotsService) {}

  @Start()
  async onStart(@Ctx() ctx: Context) {
    await this.handle(ctx);
  }

  @Help()
  async onHelp(@Ctx() ctx: Context) {
    await this.handle(ctx);
  }

  @Command([...CANCEL_COMMANDS])
  async onCancel(@Ctx() ctx: Context) {
    await this.handle(ctx);
  }

  @Command('reply')
  async onReply(@Ctx() ctx: Context) {
    await this.handle(ctx);
  }

  @On('text')
  async onText(@Ctx() ctx: Context) {
    await this.handle(ctx);
  }

  @On('callback_query')
  async onCallbackQuery(@Ctx() ctx: Context) {
    await ctx.answerCbQuery();
    await this.handle(ctx);
  }

  private async handle(ctx: Context): Promise<void> {
    const update = this.toIncomingUpdate(ctx);
    if (!update) {
      this.logger.warn(`Ignoring update ${ctx.update.update_id} without chat or sender`);
      return;
    }

    const { messages } = await this.telegramBotsService.handleUpdate(update);
    for (const message of messages) {
      await ctx.reply(message.text, buildReplyExtra(message.markup));
    }
  }

  private toIncomingUpdate(ctx: Context): IncomingUpdate | null {
    const { chat, from } = ctx;
    if (!chat || !from) return null;

    const message = ctx.message;
    const callback = ctx.callbackQuery;

    return {
      chatId: String(chat.id),
      from: {
        id: String(from.id),
        username: from.username,
        firstName: from.first_name,
        lastName: from.last_name,
      },
      text: message && 'text' in message ? message.text : undefined,
      callbackData: callback && 'data' in callback ? callback.data : undefined,
    };
  }
}
