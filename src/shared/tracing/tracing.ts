/**
 * @fileoverview OpenTelemetry Tracing Bootstrap
 *
 * Starts tracing on import, so main.ts imports this first.
 */

import { createTracingSdk, readTracingEnv } from './tracing-sdk';

const sdk = createTracingSdk(readTracingEnv(process.env));

sdk.start();

process.on('SIGTERM', () => {
    sdk.shutdown()
        .then(() => console.log('Tracing terminated'))
        .catch((error: Error) => console.error('Error terminating tracing', error))
        .finally(() => process.exit(0));
});

export { sdk };
