import request from 'supertest';
import { INestApplication } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { Test } from '@nestjs/testing';
import { ThrottlerModule } from '@nestjs/throttler';
import { HttpThrottlerGuard } from '@shared/guards/http-throttler.guard';
import { HealthController } from './health.controller';
import { HealthService } from './health.service';

describe('HealthController', () => {
  const health = { check: jest.fn() };
  let app: INestApplication;

  beforeEach(async () => {
    health.check.mockReset().mockResolvedValue({ status: 'ok', database: 'ok' });

    const moduleRef = await Test.createTestingModule({
      imports: [ThrottlerModule.forRoot([{ name: 'short', ttl: 60000, limit: 2 }])],
      controllers: [HealthController],
      providers: [
        { provide: HealthService, useValue: health },
        { provide: APP_GUARD, useClass: HttpThrottlerGuard },
      ],
    }).compile();

    app = moduleRef.createNestApplication();
    await app.init();
  });

  afterEach(async () => {
    await app.close();
  });

  it('is never rate limited', async () => {
    const statuses: number[] = [];
    for (let attempt = 0; attempt < 5; attempt++) {
      const res = await request(app.getHttpServer()).get('/health');
      statuses.push(res.status);
    }

    expect(statuses).toEqual([200, 200, 200, 200, 200]);
  });

  it('answers 503 when the database is down', async () => {
    health.check.mockResolvedValue({ status: 'critical', database: 'error' });

    const res = await request(app.getHttpServer()).get('/health').expect(503);

    expect(res.body).toEqual({ status: 'critical', database: 'error' });
  });
});
