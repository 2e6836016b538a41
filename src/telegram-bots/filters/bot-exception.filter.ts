import { ArgumentsHost, Catch, ExceptionFilter, Logger } from '@nestjs/common';
import { TelegrafArgumentsHost } from 'nestjs-telegraf';
import { Context } from 'telegraf';

export const GENERIC_BOT_ERROR = '❌ Something went wrong. Please try again or type /start.';

@Catch()
export class BotExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(BotExceptionFilter.name);

  async catch(exception: unknown, host: ArgumentsHost): Promise<void> {
    const ctx = TelegrafArgumentsHost.create(host).getContext<Context>();
    this.logger.error(
      `Unhandled error for update ${ctx.update.update_id}`,
      exception instanceof Error ? exception.stack : String(exception),
    );

    try {
      await ctx.reply(GENERIC_BOT_ERROR);
    } catch (replyError) {
      this.logger.error(`Could not send the error reply: ${String(replyError)}`);
    }
  }
}
