import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { TypeOrmModule } from '@nestjs/typeorm';
import { CustomerMessage } from '@common/entities/customer-message.entity';
import { Order } from '@common/entities/order.entity';
import { Schedule } from '@common/entities/schedule.entity';
import { TelegramUser } from '@common/entities/telegram-user.entity';
import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';
import { inMemoryDatabase } from '@test/database';
import type { NewOrder } from '../interfaces/customer-request.interface';
import { MessagesService } from './messages.service';
import { OrdersService } from './orders.service';
import { SchedulesService } from './schedules.service';
import { UsersService } from './users.service';

const order = (overrides: Partial<NewOrder> = {}): NewOrder => ({
  customerName: 'John Doe',
  companyName: null,
  productType: 'Business Cards',
  serviceId: null,
  quantity: 50,
  deliveryDate: '25/12/2030',
  contactInfo: 'test@example.com',
  telegramUserId: '1001',
  ...overrides,
});

describe('CRM services', () => {
  let moduleRef: TestingModule;
  let users: UsersService;
  let orders: OrdersService;
  let schedules: SchedulesService;
  let messages: MessagesService;

  beforeEach(async () => {
    moduleRef = await Test.createTestingModule({
      imports: [inMemoryDatabase(), TypeOrmModule.forFeature([TelegramUser, Order, Schedule, CustomerMessage])],
      providers: [UsersService, OrdersService, SchedulesService, MessagesService],
    }).compile();

    users = moduleRef.get(UsersService);
    orders = moduleRef.get(OrdersService);
    schedules = moduleRef.get(SchedulesService);
    messages = moduleRef.get(MessagesService);
  });

  afterEach(async () => {
    await moduleRef.close();
  });

  describe('UsersService', () => {
    it('creates a user once and refreshes the profile afterwards', async () => {
      const first = await users.touch({ id: '1001', username: 'jdoe', firstName: 'John' });
      const second = await users.touch({ id: '1001', username: 'johnd', firstName: 'John', lastName: 'Doe' });

      expect(second.id).toBe(first.id);
      expect(await users.count()).toBe(1);
      expect(await users.findByTelegramId('1001')).toMatchObject({
        username: 'johnd',
        firstName: 'John',
        lastName: 'Doe',
      });
    });
  });

  describe('OrdersService', () => {
    it('stores new orders as pending', async () => {
      const created = await orders.create(order({ companyName: 'Acme Ltd' }));

      expect(await orders.findById(created.id)).toMatchObject({
        customerName: 'John Doe',
        companyName: 'Acme Ltd',
        quantity: 50,
        status: OrderStatus.PENDING,
        notes: null,
      });
    });

    it('lists newest first, filtered by status and limited', async () => {
      const first = await orders.create(order({ customerName: 'First Customer' }));
      await orders.create(order({ customerName: 'Second Customer' }));
      await orders.create(order({ customerName: 'Third Customer' }));
      await orders.updateStatus(first.id, OrderStatus.COMPLETED, 'Picked up');

      const pending = await orders.list({ status: OrderStatus.PENDING });
      const latest = await orders.list({ limit: 1 });

      expect(pending.map((item) => item.customerName)).toEqual(['Third Customer', 'Second Customer']);
      expect(latest.map((item) => item.customerName)).toEqual(['Third Customer']);
      expect(await orders.countByStatus(OrderStatus.COMPLETED)).toBe(1);
      expect(await orders.findById(first.id)).toMatchObject({ status: OrderStatus.COMPLETED, notes: 'Picked up' });
    });

    it('throws for unknown orders', async () => {
      await expect(orders.updateStatus(42, OrderStatus.CANCELLED)).rejects.toBeInstanceOf(NotFoundException);
    });
  });

  describe('SchedulesService', () => {
    it('creates and confirms a consultation', async () => {
      const created = await schedules.create({
        customerName: 'Jane Roe',
        contactInfo: '+1234567890',
        preferredDatetime: 'next Monday afternoon (Will confirm specific time)',
        telegramUserId: '1002',
      });

      await schedules.updateStatus(created.id, ScheduleStatus.CONFIRMED);

      expect(await schedules.findById(created.id)).toMatchObject({ status: ScheduleStatus.CONFIRMED, notes: null });
      expect(await schedules.countByStatus(ScheduleStatus.PENDING)).toBe(0);
    });
  });

  describe('MessagesService', () => {
    it('records an admin response', async () => {
      const created = await messages.create({
        customerName: 'Jane Roe',
        contactInfo: 'jane@example.com',
        messageText: 'Do you print on canvas?',
        telegramUserId: '1002',
      });
      expect(created).toMatchObject({ status: MessageStatus.PENDING, response: null });

      await messages.respond(created.id, MessageStatus.RESPONDED, 'Yes, up to A1.');

      expect(await messages.findById(created.id)).toMatchObject({
        status: MessageStatus.RESPONDED,
        response: 'Yes, up to A1.',
      });
      expect((await messages.list({ status: MessageStatus.RESPONDED })).map((item) => item.id)).toEqual([created.id]);
    });
  });
});
