/**
 * @fileoverview Application Root Module
 *
 * Configures the NestJS application with logging, metrics, persistence and
 * the characters and locations modules.
 */

import { Module } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from 'nestjs-pino';
import { PrometheusModule } from '@willsoto/nestjs-prometheus';
import { ConfigModule, EnvConfig } from './config/config.module';
import { loggerParams } from './config/logger.config';
import { CharactersModule } from './characters';
import { CharacterEntity } from './characters/entities';
import { LocationsModule } from './locations';
import { LocationEntity } from './locations/entities';

@Module({
    imports: [
        ConfigModule,

        // Logging
        LoggerModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (config: ConfigService<EnvConfig, true>) =>
                loggerParams({
                    NODE_ENV: config.get('NODE_ENV', { infer: true }),
                    LOG_LEVEL: config.get('LOG_LEVEL', { infer: true }),
                    LOKI_HOST: config.get('LOKI_HOST', { infer: true }),
                }),
        }),

        // Metrics
        PrometheusModule.register({
            path: '/metrics',
            defaultMetrics: { enabled: true },
        }),

        // TypeORM for PostgreSQL
        TypeOrmModule.forRootAsync({
            inject: [ConfigService],
            useFactory: (config: ConfigService<EnvConfig, true>) => {
                const isProduction = config.get('NODE_ENV', { infer: true }) === 'production';
                const password = config.get('POSTGRES_PASSWORD', { infer: true });

                // SECURITY: Require explicit password in production
                if (isProduction && !password) {
                    throw new Error(
                        'CRITICAL: POSTGRES_PASSWORD must be set in production'
                    );
                }

                return {
                    type: 'postgres',
                    host: config.get('POSTGRES_HOST', { infer: true }),
                    port: config.get('POSTGRES_PORT', { infer: true }),
                    username: config.get('POSTGRES_USER', { infer: true }),
                    password: password ?? 'postgres', // Default only for local dev
                    database: config.get('POSTGRES_DB', { infer: true }),
                    entities: [CharacterEntity, LocationEntity],
                    // SECURITY: Never synchronize schema in production
                    synchronize: !isProduction,
                    logging: !isProduction,
                };
            },
        }),

        // Feature modules
        CharactersModule,
        LocationsModule,
    ],
})
export class AppModule { }
