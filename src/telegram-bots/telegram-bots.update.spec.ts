import { APP_GUARD } from '@nestjs/core';
import { Test, TestingModule } from '@nestjs/testing';
import { ThrottlerModule } from '@nestjs/throttler';
import { getBotToken, TelegrafModule } from 'nestjs-telegraf';
import { Telegraf } from 'telegraf';
import type { Message, Update } from 'telegraf/typings/core/types/typegram';
import { HttpThrottlerGuard } from '@shared/guards/http-throttler.guard';
import { GENERIC_BOT_ERROR } from './filters/bot-exception.filter';
import { TelegramBotsService } from './telegram-bots.service';
import { TelegramBotsUpdate } from './telegram-bots.update';

const textUpdate = (updateId: number, text: string): Update => ({
  update_id: updateId,
  message: {
    message_id: updateId,
    date: 1_900_000_000,
    chat: { id: 42, type: 'private', first_name: 'Sam' },
    from: { id: 42, is_bot: false, first_name: 'Sam', username: 'sam' },
    text,
  },
});

const sentMessage: Message.TextMessage = {
  message_id: 100,
  date: 1_900_000_000,
  chat: { id: 42, type: 'private', first_name: 'Sam' },
  text: 'sent',
};

describe('TelegramBotsUpdate', () => {
  const service = { handleUpdate: jest.fn() };

  let moduleRef: TestingModule;
  let bot: Telegraf;
  let sendMessage: jest.SpyInstance;

  const sentTexts = () => sendMessage.mock.calls.map(([, text]) => text);

  beforeEach(async () => {
    service.handleUpdate.mockReset();
    service.handleUpdate.mockResolvedValue({ messages: [{ text: 'Hi <b>Sam</b>', markup: { type: 'main_menu' } }] });

    moduleRef = await Test.createTestingModule({
      imports: [
        TelegrafModule.forRoot({ token: 'test-token', launchOptions: false }),
        ThrottlerModule.forRoot([{ name: 'short', ttl: 60000, limit: 2 }]),
      ],
      providers: [
        TelegramBotsUpdate,
        { provide: TelegramBotsService, useValue: service },
        { provide: APP_GUARD, useClass: HttpThrottlerGuard },
      ],
    }).compile();
    await moduleRef.init();

    bot = moduleRef.get<Telegraf>(getBotToken());
    bot.botInfo = {
      id: 1,
      is_bot: true,
      first_name: 'Print Bot',
      username: 'print_bot',
      can_join_groups: false,
      can_read_all_group_messages: false,
      supports_inline_queries: false,
    };
    sendMessage = jest.spyOn(bot.telegram, 'sendMessage').mockResolvedValue(sentMessage);
    jest.spyOn(bot, 'stop').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await moduleRef.close();
    jest.restoreAllMocks();
  });

  it('routes text messages to the service and sends its replies as HTML', async () => {
    await bot.handleUpdate(textUpdate(1, 'Hello'));

    expect(service.handleUpdate).toHaveBeenCalledWith({
      chatId: '42',
      from: { id: '42', username: 'sam', firstName: 'Sam', lastName: undefined },
      text: 'Hello',
      callbackData: undefined,
    });
    expect(sendMessage).toHaveBeenCalledTimes(1);
    expect(sendMessage).toHaveBeenCalledWith(42, 'Hi <b>Sam</b>', expect.objectContaining({ parse_mode: 'HTML' }));
  });

  it('is not rate limited by the HTTP throttler', async () => {
    for (let updateId = 1; updateId <= 4; updateId++) {
      await bot.handleUpdate(textUpdate(updateId, `message ${updateId}`));
    }

    expect(service.handleUpdate).toHaveBeenCalledTimes(4);
    expect(sentTexts()).toEqual(['Hi <b>Sam</b>', 'Hi <b>Sam</b>', 'Hi <b>Sam</b>', 'Hi <b>Sam</b>']);
  });

  it('answers with the generic error when handling fails', async () => {
    service.handleUpdate.mockRejectedValueOnce(new Error('redis down'));

    await bot.handleUpdate(textUpdate(1, 'Hello'));

    expect(sentTexts()).toEqual([GENERIC_BOT_ERROR]);
  });
});
