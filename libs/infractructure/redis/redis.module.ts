import { Global, Module } from '@nestjs/common';
import Redis from 'ioredis';
import { cfg } from '@common/config/config.service';
import { REDIS_CLIENT, RedisService } from './redis.service';

@Global()
@Module({
	providers: [
		{
			provide: REDIS_CLIENT,
			useFactory: () => {
				const { host, port, password } = cfg.redis;
				return new Redis({ host, port, password, maxRetriesPerRequest: 3 });
			},
		},
		RedisService,
	],
	exports: [RedisService],
})
export class RedisModule {}
