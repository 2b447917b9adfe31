import { Counter } from 'prom-client';

export const recordWritesCounter = new Counter({
    name: 'records_written_total',
    help: 'Total number of record writes',
    labelNames: ['resource', 'operation'],
});

export type RecordResource = 'character' | 'location';
export type RecordOperation = 'create' | 'replace' | 'update' | 'delete';

export function countWrite(resource: RecordResource, operation: RecordOperation): void {
    recordWritesCounter.inc({ resource, operation });
}
