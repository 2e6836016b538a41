import { mkdirSync } from 'fs';
import { dirname } from 'path';
import { Module } from "@nestjs/common";
import { TypeOrmModule } from "@nestjs/typeorm";
import { cfg } from "@common/config/config.service";
import { ENTITIES } from "@common/entities";

export const IN_MEMORY_DATABASE = ':memory:';

@Module({
    imports: [TypeOrmModule.forRootAsync({
        useFactory: () => {
            const { path, logging } = cfg.database;
            if (path !== IN_MEMORY_DATABASE) {
                mkdirSync(dirname(path), { recursive: true });
            }
            return {
                type: 'better-sqlite3',
                database: path,
                entities: ENTITIES,
                synchronize: true,
                logging,
            };
        },
    })],
})
export class DatabaseModule {}
