// OpenTelemetry must be imported FIRST before any other imports
import './shared/tracing/tracing';

import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { ConfigService } from '@nestjs/config';
import { Logger } from 'nestjs-pino';
import { AppModule } from './app.module';
import { EnvConfig } from './config/config.module';

async function bootstrap(): Promise<void> {
    const app = await NestFactory.create(AppModule, { bufferLogs: true });

    // Use Pino logger
    const logger = app.get(Logger);
    app.useLogger(logger);
    app.enableShutdownHooks();

    const port = app.get<ConfigService<EnvConfig, true>>(ConfigService).get('PORT', { infer: true });
    await app.listen(port);

    logger.log(`Character locations API running on http://localhost:${port}`);
}

bootstrap().catch((error: unknown) => {
    console.error('Failed to start application', error);
    process.exit(1);
});
