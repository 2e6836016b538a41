import cookieParser from 'cookie-parser';
import request from 'supertest';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import { ThrottlerModule } from '@nestjs/throttler';
import { MessageStatus, OrderStatus, ScheduleStatus } from '@common/enums/request-status.enum';
import { HttpThrottlerGuard } from '@shared/guards/http-throttler.guard';
import { addDays, formatCalendarDate } from '@shared/validators/date-parsing';
import { inMemoryDatabase } from '@test/database';
import { setEnv } from '@test/env';
import { PrintServicesService } from 'src/catalog/services/print-services.service';
import { MessagesService } from 'src/crm/services/messages.service';
import { OrdersService } from 'src/crm/services/orders.service';
import { SchedulesService } from 'src/crm/services/schedules.service';
import { UsersService } from 'src/crm/services/users.service';
import { NotificationsService } from 'src/notifications/services/notifications.service';
import { AdminModule } from './admin.module';

describe('Admin and public API', () => {
  const notifications = {
    notifyNewOrder: jest.fn(),
    notifyNewSchedule: jest.fn(),
    notifyNewMessage: jest.fn(),
    replyToCustomer: jest.fn(),
    broadcastToChannel: jest.fn(),
  };

  let app: INestApplication;
  let restoreEnv: () => void;

  const http = () => request(app.getHttpServer());

  const signIn = async (): Promise<string> => {
    const res = await http().post('/admin/login').send({ password: 'test-password' }).expect(200);
    return res.headers['set-cookie'];
  };

  beforeEach(async () => {
    restoreEnv = setEnv({
      ADMIN_PASSWORD: 'test-password',
      ADMIN_SECRET_KEY: 'test-secret',
      ADMIN_SESSION_TTL: undefined,
    });
    for (const mock of Object.values(notifications)) {
      mock.mockReset().mockResolvedValue(true);
    }

    const moduleRef = await Test.createTestingModule({
      imports: [
        inMemoryDatabase(),
        ThrottlerModule.forRoot([{ name: 'short', ttl: 60000, limit: 100 }]),
        AdminModule,
      ],
      providers: [{ provide: APP_GUARD, useClass: HttpThrottlerGuard }],
    })
      .overrideProvider(NotificationsService)
      .useValue(notifications)
      .compile();

    app = moduleRef.createNestApplication();
    app.use(cookieParser());
    app.useGlobalPipes(new ValidationPipe({ whitelist: true, transform: true }));
    await app.init();
  });

  afterEach(async () => {
    await app.close();
    restoreEnv();
  });

  describe('auth', () => {
    it('rejects a wrong password', async () => {
      await http().post('/admin/login').send({ password: 'nope' }).expect(401);
    });

    it('issues a session token and an httpOnly cookie', async () => {
      const res = await http().post('/admin/login').send({ password: 'test-password' }).expect(200);

      expect(res.body.success).toBe(true);
      expect(res.body.data.expiresIn).toBe('12h');
      expect(typeof res.body.data.accessToken).toBe('string');
      const [cookie] = res.headers['set-cookie'];
      expect(cookie.startsWith(`admin_session=${res.body.data.accessToken};`)).toBe(true);
      expect(cookie).toContain('HttpOnly');
    });

    it('guards admin routes', async () => {
      await http().get('/admin/services').expect(401);
      await http().get('/admin/services').set('Authorization', 'Bearer not-a-token').expect(401);
    });

    it('accepts the token as a bearer header', async () => {
      const login = await http().post('/admin/login').send({ password: 'test-password' }).expect(200);

      await http().get('/admin/dashboard').set('Authorization', `Bearer ${login.body.data.accessToken}`).expect(200);
    });

    it('limits login attempts to five a minute', async () => {
      for (let attempt = 0; attempt < 5; attempt++) {
        await http().post('/admin/login').send({ password: 'wrong' }).expect(401);
      }
      await http().post('/admin/login').send({ password: 'test-password' }).expect(429);
    });
  });

  describe('catalog', () => {
    it('starts from the default catalog', async () => {
      const res = await http().get('/api/settings/business_hours').expect(200);

      expect(res.body.data.value).toBe('Monday-Friday: 9AM-6PM, Saturday: 10AM-4PM');
    });

    it('creates services and refuses duplicate names', async () => {
      const cookie = await signIn();

      const created = await http()
        .post('/admin/services')
        .set('Cookie', cookie)
        .send({ name: 'Canvas Prints', category: 'large_format', priceRange: '$40-120 each', unknownField: 'x' })
        .expect(201);

      expect(created.body.data).toMatchObject({
        name: 'Canvas Prints',
        category: 'large_format',
        priceRange: '$40-120 each',
        isActive: true,
      });
      expect(created.body.data.unknownField).toBeUndefined();

      await http().post('/admin/services').set('Cookie', cookie).send({ name: 'Canvas Prints' }).expect(409);
      await http().post('/admin/services').set('Cookie', cookie).send({ name: 'Business Cards' }).expect(409);
      await http().post('/admin/services').set('Cookie', cookie).send({ category: 'cards' }).expect(400);
    });

    it('manages products and hides inactive ones from the public API', async () => {
      const cookie = await signIn();
      const service = await http().post('/admin/services').set('Cookie', cookie).send({ name: 'Stickers' }).expect(201);
      const serviceId: number = service.body.data.id;

      const product = await http()
        .post(`/admin/services/${serviceId}/products`)
        .set('Cookie', cookie)
        .send({ name: 'Vinyl round', price: 0.25, minQuantity: 50 })
        .expect(201);

      const listed = await http().get(`/api/products/${serviceId}`).expect(200);
      expect(listed.body.data.map((item: { name: string }) => item.name)).toEqual(['Vinyl round']);

      await http()
        .put(`/admin/products/${product.body.data.id}`)
        .set('Cookie', cookie)
        .send({ isActive: false })
        .expect(200);

      const afterDeactivation = await http().get(`/api/products/${serviceId}`).expect(200);
      expect(afterDeactivation.body.data).toEqual([]);

      await http().post('/admin/services/999/products').set('Cookie', cookie).send({ name: 'Orphan' }).expect(404);
    });

    it('lists only active services publicly', async () => {
      const cookie = await signIn();
      await http().post('/admin/services').set('Cookie', cookie).send({ name: 'Canvas Prints', category: 'large_format' });
      await http().post('/admin/services').set('Cookie', cookie).send({ name: 'Old Stock', isActive: false });

      const res = await http().get('/api/services').expect(200);

      expect(res.body.data.map((item: { name: string }) => item.name)).toEqual([
        'Business Cards',
        'Custom Printing',
        'Stickers/Labels',
        'Banners/Posters',
        'Canvas Prints',
        'Flyers/Brochures',
        'Booklets/Catalogs',
      ]);
    });

    it('updates settings and serves them by key', async () => {
      const cookie = await signIn();

      await http()
        .put('/admin/settings')
        .set('Cookie', cookie)
        .send({ settings: [{ key: 'business_hours', value: 'Mon-Fri 9-17', description: 'Opening hours' }] })
        .expect(200);

      const res = await http().get('/api/settings/business_hours').expect(200);
      expect(res.body.data).toMatchObject({ key: 'business_hours', value: 'Mon-Fri 9-17', description: 'Opening hours' });
      await http().get('/api/settings/missing_key').expect(404);
      await http().put('/admin/settings').set('Cookie', cookie).send({ settings: [] }).expect(400);
    });
  });

  describe('customer requests', () => {
    const newOrder = {
      customerName: 'John Doe',
      companyName: null,
      productType: 'Business Cards',
      serviceId: null,
      quantity: 500,
      deliveryDate: '25/12/2030',
      contactInfo: 'test@example.com',
      telegramUserId: '1001',
    };

    it('filters orders and updates their status', async () => {
      const cookie = await signIn();
      const order = await app.get(OrdersService).create(newOrder);

      const pending = await http().get('/admin/orders?status=Pending&limit=10').set('Cookie', cookie).expect(200);
      expect(pending.body.data.map((item: { id: number }) => item.id)).toEqual([order.id]);

      const updated = await http()
        .patch(`/admin/orders/${order.id}/status`)
        .set('Cookie', cookie)
        .send({ status: OrderStatus.PROCESSING, notes: 'Proof sent' })
        .expect(200);
      expect(updated.body.data).toMatchObject({ status: 'Processing', notes: 'Proof sent' });

      await http().patch(`/admin/orders/${order.id}/status`).set('Cookie', cookie).send({ status: 'Lost' }).expect(400);
      await http().get('/admin/orders/999').set('Cookie', cookie).expect(404);
    });

    it('delivers a message response to the customer chat', async () => {
      const cookie = await signIn();
      const message = await app.get(MessagesService).create({
        customerName: 'Jane Roe',
        contactInfo: 'jane@example.com',
        messageText: 'Do you print on canvas?',
        telegramUserId: '2002',
      });

      const res = await http()
        .patch(`/admin/messages/${message.id}`)
        .set('Cookie', cookie)
        .send({ status: MessageStatus.RESPONDED, response: 'Yes, up to A1.' })
        .expect(200);

      expect(res.body.data.delivered).toBe(true);
      expect(res.body.data.message).toMatchObject({ status: 'Responded', response: 'Yes, up to A1.' });
      expect(notifications.replyToCustomer).toHaveBeenCalledWith('2002', 'Yes, up to A1.');
    });

    it('closes a message without contacting the customer', async () => {
      const cookie = await signIn();
      const message = await app.get(MessagesService).create({
        customerName: 'Jane Roe',
        contactInfo: 'jane@example.com',
        messageText: 'Never mind, sorted.',
        telegramUserId: '2002',
      });

      const res = await http()
        .patch(`/admin/messages/${message.id}`)
        .set('Cookie', cookie)
        .send({ status: MessageStatus.CLOSED })
        .expect(200);

      expect(res.body.data.delivered).toBe(false);
      expect(notifications.replyToCustomer).not.toHaveBeenCalled();
    });

    it('summarises pending work on the dashboard', async () => {
      const cookie = await signIn();
      await app.get(UsersService).touch({ id: '1001', firstName: 'John' });
      await app.get(OrdersService).create(newOrder);
      await http().post('/admin/services').set('Cookie', cookie).send({ name: 'Flyers', category: 'marketing' });

      const res = await http().get('/admin/dashboard').set('Cookie', cookie).expect(200);

      expect(res.body.data).toMatchObject({
        totalServices: 7,
        activeServices: 7,
        categories: 6,
        totalUsers: 1,
        pendingOrders: 1,
        pendingSchedules: 0,
        pendingMessages: 0,
      });
      expect(res.body.data.recentOrders).toHaveLength(1);
    });
  });

  it('broadcasts to the channel', async () => {
    const cookie = await signIn();

    const res = await http()
      .post('/admin/broadcast')
      .set('Cookie', cookie)
      .send({ title: 'Summer sale', content: '20% off banners' })
      .expect(200);

    expect(res.body).toEqual({ success: true, data: { sent: true } });
    expect(notifications.broadcastToChannel).toHaveBeenCalledWith('Summer sale', '20% off banners', true);
  });

  describe('website submissions', () => {
    const deliveryDate = formatCalendarDate(addDays(new Date(), 30));

    it('normalises and stores an order, then notifies the admin', async () => {
      const res = await http()
        .post('/api/order')
        .send({
          name: 'john doe',
          company: '',
          productType: 'Business Cards',
          quantity: 500,
          deliveryDate,
          contact: 'Test@Example.com',
          notes: ' Matte finish ',
        })
        .expect(201);

      const order = await app.get(OrdersService).findById(res.body.data.id);
      const businessCards = await app.get(PrintServicesService).findByName('Business Cards');
      expect(res.body.data.notified).toBe(true);
      expect(order).toMatchObject({
        customerName: 'John Doe',
        companyName: null,
        productType: 'Business Cards',
        serviceId: businessCards?.id,
        quantity: 500,
        deliveryDate,
        contactInfo: 'test@example.com',
        telegramUserId: null,
        notes: 'Matte finish',
        status: OrderStatus.PENDING,
      });
      expect(notifications.notifyNewOrder).toHaveBeenCalledTimes(1);
      expect(notifications.notifyNewOrder).toHaveBeenCalledWith(expect.objectContaining({ id: order.id }));
    });

    it('rejects an order with the validator messages and stores nothing', async () => {
      const res = await http()
        .post('/api/order')
        .send({
          name: 'John Doe',
          productType: 'Flyers',
          quantity: '-5',
          deliveryDate: '01/01/2020',
          contact: 'test@example.com',
        })
        .expect(400);

      expect(res.body.message).toHaveLength(2);
      expect(res.body.message).toEqual(
        expect.arrayContaining(['Quantity must be at least 1', 'Delivery date must be tomorrow or later']),
      );
      expect(await app.get(OrdersService).list()).toEqual([]);
      expect(notifications.notifyNewOrder).not.toHaveBeenCalled();
    });

    it('accepts a free-form consultation time', async () => {
      const res = await http()
        .post('/api/schedule')
        .send({ name: 'jane roe', contact: '+1 (555) 123-4567', preferredDatetime: 'next Monday afternoon' })
        .expect(201);

      expect(await app.get(SchedulesService).findById(res.body.data.id)).toMatchObject({
        customerName: 'Jane Roe',
        contactInfo: '+1 (555) 123-4567',
        preferredDatetime: 'next Monday afternoon (Will confirm specific time)',
        telegramUserId: null,
        status: ScheduleStatus.PENDING,
      });
      expect(notifications.notifyNewSchedule).toHaveBeenCalledTimes(1);
    });

    it('stores a contact message even when the admin cannot be reached', async () => {
      notifications.notifyNewMessage.mockResolvedValue(false);

      await http()
        .post('/api/message')
        .send({ name: 'Jane Roe', contact: 'jane@example.com', message: 'Hi' })
        .expect(400)
        .expect((res) => expect(res.body.message).toEqual(['Message is too short (minimum 5 characters)']));

      const res = await http()
        .post('/api/message')
        .send({ name: 'Jane Roe', contact: 'jane@example.com', message: 'Do you print on canvas?' })
        .expect(201);

      expect(res.body).toEqual({ success: true, data: { id: res.body.data.id, notified: false } });
      expect(await app.get(MessagesService).findById(res.body.data.id)).toMatchObject({
        messageText: 'Do you print on canvas?',
        status: MessageStatus.PENDING,
      });
    });

    it('reports a missing field', async () => {
      const res = await http()
        .post('/api/message')
        .send({ contact: 'jane@example.com', message: 'Do you print on canvas?' })
        .expect(400);

      expect(res.body.message).toEqual(['name must be a string']);
    });
  });
});
