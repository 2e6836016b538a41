import { Inject, Injectable, OnApplicationShutdown } from "@nestjs/common";
import { Redis } from "ioredis";

export const REDIS_CLIENT = 'REDIS_CLIENT';

@Injectable()
export class RedisService implements OnApplicationShutdown {
    constructor(@Inject(REDIS_CLIENT) private readonly redisClient: Redis) {}

    async get(key: string): Promise<string | null> {
        return await this.redisClient.get(key);
    }

    async set(key: string, value: string, options?: { EX: number }): Promise<void> {
        if (options?.EX) {
            await this.redisClient.set(key, value, 'EX', options.EX);
            return;
        }
        await this.redisClient.set(key, value);
    }

    async delete(key: string): Promise<number> {
        return await this.redisClient.del(key);
    }

    async ping(): Promise<string> {
        return await this.redisClient.ping();
    }

    async onApplicationShutdown(): Promise<void> {
        await this.redisClient.quit();
    }
}
