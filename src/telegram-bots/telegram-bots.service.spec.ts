import { Logger } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ENTITIES } from '@common/entities';
import type { PrintService } from '@common/entities/print-service.entity';
import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';
import { RedisService } from '@infra/redis/redis.service';
import { addDays, formatCalendarDate } from '@shared/validators/date-parsing';
import { inMemoryDatabase } from '@test/database';
import { setEnv } from '@test/env';
import { InMemoryRedisService } from '@test/fakes/in-memory-redis.service';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { SettingsService } from 'src/catalog/services/settings.service';
import { MessagesService } from 'src/crm/services/messages.service';
import { OrdersService } from 'src/crm/services/orders.service';
import { SchedulesService } from 'src/crm/services/schedules.service';
import { UsersService } from 'src/crm/services/users.service';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import {
  ADMIN_ONLY,
  CANCELLED_MESSAGES,
  FORWARD_FAILED_REPLY,
  FORWARDED_REPLY,
  NOTHING_TO_CANCEL,
  UNKNOWN_CALLBACK_REPLY,
} from './menu/messages';
import { FLOWS } from './menu/actions';
import type { FlowName } from './menu/actions';
import { buildSaveFailedReply } from './scenes/common/utils';
import { MESSAGE_STEPS } from './scenes/direct-message';
import { ORDER_STEPS } from './scenes/place-order';
import { SCHEDULE_STEPS } from './scenes/schedule-consultation';
import { TelegramBotsService } from './telegram-bots.service';

const CUSTOMER_CHAT = '1001';
const ADMIN_CHAT = '9000';
const SESSION_KEY = `print-bot:session:${CUSTOMER_CHAT}`;

describe('TelegramBotsService', () => {
  const notifications = {
    notifyNewOrder: jest.fn(),
    notifyNewSchedule: jest.fn(),
    notifyNewMessage: jest.fn(),
    forwardToAdmin: jest.fn(),
    replyToCustomer: jest.fn(),
  };

  let moduleRef: TestingModule;
  let bot: TelegramBotsService;
  let redis: InMemoryRedisService;
  let orders: OrdersService;
  let schedules: SchedulesService;
  let messages: MessagesService;
  let businessCards: PrintService;
  let restoreEnv: () => void;

  const send = (text: string, chatId = CUSTOMER_CHAT) =>
    bot.handleUpdate({ chatId, from: { id: chatId, firstName: 'John' }, text });

  const press = (callbackData: string, chatId = CUSTOMER_CHAT) =>
    bot.handleUpdate({ chatId, from: { id: chatId, firstName: 'John' }, callbackData });

  const storedSession = async () => {
    const raw = await redis.get(SESSION_KEY);
    return raw ? JSON.parse(raw) : null;
  };

  beforeEach(async () => {
    restoreEnv = setEnv({
      BOT_TOKEN: 'test-token',
      ADMIN_CHAT_ID: ADMIN_CHAT,
      CHANNEL_USERNAME: '@print_news',
      SESSION_TTL_SECONDS: undefined,
      BUSINESS_NAME: 'Ink & Paper',
      BUSINESS_EMAIL: 'hello@example.com',
      BUSINESS_PHONE: '+1000000000',
    });

    for (const mock of Object.values(notifications)) {
      mock.mockReset();
      mock.mockResolvedValue(true);
    }
    redis = new InMemoryRedisService();

    moduleRef = await Test.createTestingModule({
      imports: [inMemoryDatabase(), TypeOrmModule.forFeature(ENTITIES)],
      providers: [
        TelegramBotsService,
        PrintServicesService,
        SettingsService,
        UsersService,
        OrdersService,
        SchedulesService,
        MessagesService,
        { provide: RedisService, useValue: redis },
        { provide: NotificationsService, useValue: notifications },
      ],
    }).compile();

    bot = moduleRef.get(TelegramBotsService);
    orders = moduleRef.get(OrdersService);
    schedules = moduleRef.get(SchedulesService);
    messages = moduleRef.get(MessagesService);

    const catalog = moduleRef.get(PrintServicesService);
    businessCards = await catalog.create({ name: 'Business Cards', category: 'cards', priceRange: '$50-200 per 1000' });
    await catalog.create({ name: 'Flyers/Brochures', category: 'marketing', priceRange: '$100-500' });
  });

  afterEach(async () => {
    await moduleRef.close();
    restoreEnv();
  });

  describe('menu', () => {
    it('greets on /start with the default welcome text and records the user', async () => {
      const { messages: replies } = await send('/start');

      expect(replies).toEqual([
        {
          text: [
            '👋 <b>Welcome to Ink &amp; Paper!</b>',
            '',
            'Your trusted printing partner at Ink &amp; Paper.',
            '',
            'Choose an option from the menu below.',
          ].join('\n'),
          markup: { type: 'main_menu' },
        },
      ]);
      expect(await moduleRef.get(UsersService).findByTelegramId(CUSTOMER_CHAT)).toMatchObject({ firstName: 'John' });
    });

    it('uses the welcome_message setting when present', async () => {
      await moduleRef.get(SettingsService).upsertMany([{ key: 'welcome_message', value: 'Fresh prints daily.' }]);

      const { messages: replies } = await send('/start');

      expect(replies[0].text.split('\n')[2]).toBe('Fresh prints daily.');
    });

    it('lists active services with the flow buttons', async () => {
      const { messages: replies } = await send('📋 View Services');

      expect(replies).toHaveLength(1);
      expect(replies[0].markup).toEqual({ type: 'flow_actions' });
      expect(replies[0].text.split('\n').slice(0, 5)).toEqual([
        '📋 <b>Our Services</b>',
        '',
        '🖨️ <b>Business Cards</b>',
        '💰 $50-200 per 1000',
        '⏱️ 1-3 business days',
      ]);
    });

    it('links to the configured channel', async () => {
      const { messages: replies } = await press('view_channel');

      expect(replies[0].markup).toEqual({ type: 'link', label: 'Open @print_news', url: 'https://t.me/print_news' });
    });

    it('answers stale buttons with the menu', async () => {
      const { messages: replies } = await press('old_button');

      expect(replies).toEqual([{ text: UNKNOWN_CALLBACK_REPLY, markup: { type: 'main_menu' } }]);
    });

    it('forwards free text to the admin outside a flow', async () => {
      const { messages: replies } = await send('Do you print on canvas?');

      expect(notifications.forwardToAdmin).toHaveBeenCalledWith(
        { id: CUSTOMER_CHAT, firstName: 'John' },
        CUSTOMER_CHAT,
        'Do you print on canvas?',
      );
      expect(replies).toEqual([{ text: FORWARDED_REPLY, markup: { type: 'main_menu' } }]);
    });

    it('tells the customer and logs the chat when the forward fails', async () => {
      notifications.forwardToAdmin.mockResolvedValue(false);
      const warn = jest.spyOn(Logger.prototype, 'warn').mockImplementation(() => undefined);

      const { messages: replies } = await send('Do you print on canvas?');

      expect(replies).toEqual([{ text: FORWARD_FAILED_REPLY, markup: { type: 'main_menu' } }]);
      expect(warn).toHaveBeenCalledWith(`Could not forward a message from chat ${CUSTOMER_CHAT} to the admin`);
      warn.mockRestore();
    });

    it('does not forward the admin their own messages', async () => {
      const { messages: replies } = await send('hello', ADMIN_CHAT);

      expect(notifications.forwardToAdmin).not.toHaveBeenCalled();
      expect(replies[0].text).toBe('To answer a customer, send Usage: /reply &lt;chatId&gt; &lt;message&gt;');
    });

    it('treats an unreadable session as no session', async () => {
      await redis.set(SESSION_KEY, '{not json');

      await send('Do you print on canvas?');

      expect(notifications.forwardToAdmin).toHaveBeenCalledTimes(1);
    });
  });

  describe('/reply', () => {
    it('delivers the admin reply to the customer', async () => {
      const { messages: replies } = await send('/reply 1001 Your cards are ready', ADMIN_CHAT);

      expect(notifications.replyToCustomer).toHaveBeenCalledWith('1001', 'Your cards are ready');
      expect(replies).toEqual([{ text: '✅ Reply sent to 1001.' }]);
    });

    it('is refused for anyone but the admin', async () => {
      const { messages: replies } = await send('/reply 2002 hi');

      expect(notifications.replyToCustomer).not.toHaveBeenCalled();
      expect(replies).toEqual([{ text: ADMIN_ONLY }]);
    });
  });

  describe('order flow', () => {
    const deliveryDate = () => formatCalendarDate(addDays(new Date(), 30));

    const fillOrderUntilContact = async () => {
      await press('place_order');
      await send('john doe');
      await send('skip');
      await send('1');
      await send('500');
      await send(deliveryDate());
    };

    it('starts with the name step and a session that expires', async () => {
      const { messages: replies } = await press('place_order');

      expect(replies[0].markup).toEqual({ type: 'remove' });
      expect(replies[0].text.split('\n')[0]).toBe('🛒 <b>Place an Order</b>');
      expect(await storedSession()).toEqual({ activeFlow: { flow: 'order', state: { step: 'name', data: {} } } });
      expect(redis.ttl(SESSION_KEY)).toBe(21600);
    });

    it('shows the catalog as a numbered list after the company step', async () => {
      await press('place_order');
      await send('john doe');
      const { messages: replies } = await send('skip');

      expect(replies[0].text).toBe(
        [
          '✅ Personal order',
          '',
          '🖨️ <b>Which service do you need?</b>',
          '',
          '1. Business Cards',
          '2. Flyers/Brochures',
          '',
          '<i>Reply with the number or the name of the service.</i>',
        ].join('\n'),
      );
    });

    it('saves one order, notifies once and clears the session', async () => {
      const date = deliveryDate();
      await fillOrderUntilContact();
      const { messages: replies } = await send('Test@Example.com');

      const saved = await orders.list();
      expect(saved).toHaveLength(1);
      expect(saved[0]).toMatchObject({
        customerName: 'John Doe',
        companyName: null,
        productType: 'Business Cards',
        serviceId: businessCards.id,
        quantity: 500,
        deliveryDate: date,
        contactInfo: 'test@example.com',
        telegramUserId: CUSTOMER_CHAT,
        status: OrderStatus.PENDING,
      });
      expect(notifications.notifyNewOrder).toHaveBeenCalledTimes(1);
      expect(notifications.notifyNewOrder).toHaveBeenCalledWith(expect.objectContaining({ id: saved[0].id }));
      expect(replies[0].text.split('\n')[0]).toBe('✅ <b>Order placed successfully!</b>');
      expect(replies[0].markup).toEqual({ type: 'main_menu' });
      expect(redis.has(SESSION_KEY)).toBe(false);
    });

    it('keeps the step and explains the problem on invalid input', async () => {
      await press('place_order');
      await send('john doe');
      await send('skip');
      await send('2');
      const { messages: replies } = await send('lots');

      expect(replies).toEqual([
        {
          text:
            '❌ Please enter a valid whole number (e.g. 100)\n\n' +
            '🔢 How many do you need? Enter a whole number from 1 to 100,000.',
        },
      ]);
      const session = await storedSession();
      expect(session.activeFlow.state.step).toBe('quantity');
      expect(session.activeFlow.state.data.productType).toBe('Flyers/Brochures');
    });

    it('treats menu labels as answers while a flow is active', async () => {
      await press('place_order');
      const { messages: replies } = await send('🛒 Place Order');

      expect(replies[0].text.startsWith('❌ Name can only contain letters')).toBe(true);
      expect((await storedSession()).activeFlow.state.step).toBe('name');
    });

    it('apologises and ends the flow when the order cannot be saved', async () => {
      jest.spyOn(orders, 'create').mockRejectedValueOnce(new Error('disk full'));
      await fillOrderUntilContact();

      const { messages: replies } = await send('+1 555 123 4567');

      expect(replies).toEqual([buildSaveFailedReply('order')]);
      expect(notifications.notifyNewOrder).not.toHaveBeenCalled();
      expect(redis.has(SESSION_KEY)).toBe(false);
    });

    it('is replaced when another flow is started from a button', async () => {
      await press('place_order');
      await send('john doe');
      await press('direct_message');

      expect(await storedSession()).toEqual({ activeFlow: { flow: 'message', state: { step: 'name', data: {} } } });
    });
  });

  describe('cancel', () => {
    const flowAnswers: Record<FlowName, { button: string; steps: readonly string[]; answers: string[] }> = {
      order: {
        button: 'place_order',
        steps: ORDER_STEPS,
        answers: ['john doe', 'skip', '1', '500', formatCalendarDate(addDays(new Date(), 30))],
      },
      schedule: { button: 'schedule_talk', steps: SCHEDULE_STEPS, answers: ['Jane Roe', 'jane@example.com'] },
      message: { button: 'direct_message', steps: MESSAGE_STEPS, answers: ['Jane Roe', 'jane@example.com'] },
    };

    const cases = FLOWS.flatMap((flow) => {
      const { button, steps, answers } = flowAnswers[flow];
      return steps.map((step, index) => ({ flow, step, button, answers: answers.slice(0, index) }));
    });

    it.each(cases)(
      'clears the $flow flow at the $step step without saving anything',
      async ({ flow, step, button, answers }) => {
        await press(button);
        for (const answer of answers) {
          await send(answer);
        }
        expect(await storedSession()).toMatchObject({ activeFlow: { flow, state: { step } } });

        const { messages: replies } = await send('/cancel');

        expect(replies).toEqual([{ text: CANCELLED_MESSAGES[flow], markup: { type: 'main_menu' } }]);
        expect(redis.has(SESSION_KEY)).toBe(false);
        expect(await orders.list()).toEqual([]);
        expect(await schedules.list()).toEqual([]);
        expect(await messages.list()).toEqual([]);
        expect(notifications.notifyNewOrder).not.toHaveBeenCalled();
        expect(notifications.notifyNewSchedule).not.toHaveBeenCalled();
        expect(notifications.notifyNewMessage).not.toHaveBeenCalled();
      },
    );

    it('reports when there is nothing to cancel', async () => {
      const { messages: replies } = await send('/stop');

      expect(replies).toEqual([{ text: NOTHING_TO_CANCEL, markup: { type: 'main_menu' } }]);
    });
  });

  describe('schedule flow', () => {
    it('stores a free-form preference with a confirmation note', async () => {
      await send('📅 Schedule a Talk');
      await send('Jane Roe');
      await send('jane@example.com');
      await send('next Monday afternoon');

      const saved = await schedules.list();
      expect(saved).toHaveLength(1);
      expect(saved[0]).toMatchObject({
        customerName: 'Jane Roe',
        contactInfo: 'jane@example.com',
        preferredDatetime: 'next Monday afternoon (Will confirm specific time)',
        status: ScheduleStatus.PENDING,
      });
      expect(notifications.notifyNewSchedule).toHaveBeenCalledTimes(1);
      expect(redis.has(SESSION_KEY)).toBe(false);
    });
  });

  describe('direct message flow', () => {
    it('stores the message and notifies the admin', async () => {
      await send('💬 Message Me Directly');
      await send('Jane Roe');
      await send('+1 (555) 123-4567');
      const { messages: replies } = await send('Can you print on recycled paper?');

      const saved = await messages.list();
      expect(saved).toHaveLength(1);
      expect(saved[0]).toMatchObject({
        customerName: 'Jane Roe',
        contactInfo: '+1 (555) 123-4567',
        messageText: 'Can you print on recycled paper?',
        status: MessageStatus.PENDING,
        response: null,
      });
      expect(notifications.notifyNewMessage).toHaveBeenCalledTimes(1);
      expect(replies[0].text.split('\n')[0]).toBe('✅ <b>Message sent!</b>');
    });
  });
});
