/**
 * @fileoverview Tracing SDK Factory
 *
 * Builds the OpenTelemetry NodeSDK. Tracing starts before Nest and its
 * ConfigModule, so it reads its own two variables from the environment.
 */

import { NodeSDK } from '@opentelemetry/sdk-node';
import { getNodeAutoInstrumentations } from '@opentelemetry/auto-instrumentations-node';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import { SemanticResourceAttributes } from '@opentelemetry/semantic-conventions';
import {
    AlwaysOnSampler,
    ParentBasedSampler,
    Sampler,
    TraceIdRatioBasedSampler,
} from '@opentelemetry/sdk-trace-node';
import { z } from 'zod';
import { SERVICE_NAME } from '../../config/logger.config';

const DEFAULT_TRACES_ENDPOINT = 'http://localhost:4318/v1/traces';
const PRODUCTION_SAMPLE_RATIO = 0.1;

export const tracingEnvSchema = z.object({
    NODE_ENV: z.string().default('development'),
    OTEL_EXPORTER_OTLP_ENDPOINT: z.string().url().default(DEFAULT_TRACES_ENDPOINT),
});

export type TracingEnv = z.infer<typeof tracingEnvSchema>;

export function readTracingEnv(env: NodeJS.ProcessEnv): TracingEnv {
    const result = tracingEnvSchema.safeParse(env);
    if (!result.success) {
        throw new Error(`Invalid tracing configuration: ${JSON.stringify(result.error.format())}`);
    }
    return result.data;
}

/**
 * Every trace locally; a tenth of root traces in production, children follow their parent.
 */
export function tracingSampler(environment: string): Sampler {
    return environment === 'production'
        ? new ParentBasedSampler({ root: new TraceIdRatioBasedSampler(PRODUCTION_SAMPLE_RATIO) })
        : new AlwaysOnSampler();
}

export function createTracingSdk(env: TracingEnv): NodeSDK {
    return new NodeSDK({
        resource: new Resource({
            [SemanticResourceAttributes.SERVICE_NAME]: SERVICE_NAME,
            [SemanticResourceAttributes.SERVICE_VERSION]: '1.0.0',
            [SemanticResourceAttributes.DEPLOYMENT_ENVIRONMENT]: env.NODE_ENV,
        }),
        traceExporter: new OTLPTraceExporter({ url: env.OTEL_EXPORTER_OTLP_ENDPOINT }),
        sampler: tracingSampler(env.NODE_ENV),
        instrumentations: [
            getNodeAutoInstrumentations({
                // Disable noisy instrumentations
                '@opentelemetry/instrumentation-fs': { enabled: false },
                '@opentelemetry/instrumentation-dns': { enabled: false },
            }),
        ],
    });
}
