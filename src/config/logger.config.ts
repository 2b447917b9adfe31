import type { Params } from 'nestjs-pino';
import type { TransportTargetOptions } from 'pino';
import type { EnvConfig } from './config.module';

export const SERVICE_NAME = 'character-locations-api';

export type LoggerEnv = Pick<EnvConfig, 'NODE_ENV' | 'LOG_LEVEL' | 'LOKI_HOST'>;

/**
 * Pretty output outside production, JSON on stdout in production, and a
 * Loki copy whenever LOKI_HOST is set.
 */
export function loggerParams(env: LoggerEnv): Params {
    const isProduction = env.NODE_ENV === 'production';
    const level = env.LOG_LEVEL ?? (isProduction ? 'info' : 'debug');

    const targets: TransportTargetOptions[] = [];
    if (!isProduction) {
        targets.push({ target: 'pino-pretty', level, options: { colorize: true } });
    }
    if (env.LOKI_HOST) {
        targets.push({
            target: 'pino-loki',
            level,
            options: {
                host: env.LOKI_HOST,
                labels: { app: SERVICE_NAME },
                batching: true,
                interval: 5,
            },
        });
        if (isProduction) {
            targets.push({ target: 'pino/file', level, options: { destination: 1 } });
        }
    }

    return {
        pinoHttp: {
            level,
            transport: targets.length > 0 ? { targets } : undefined,
            redact: ['req.headers.authorization', 'req.headers.cookie', 'res.headers["set-cookie"]'],
        },
    };
}
