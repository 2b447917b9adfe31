/**
 * @fileoverview Instants
 *
 * ISO-8601 date and date-time shapes are checked by zod; this module turns
 * accepted text into UTC instants with microsecond precision.
 */

import { z } from 'zod';
import { ParseResult, parsed, rejected } from './parse-result';

/**
 * UTC ISO-8601 instant with six fractional digits, e.g.
 * `2023-01-01T18:59:00.618123Z`. Fixed width, so text order is time order.
 */
export type Instant = string;

/**
 * An instant split into what a JS Date holds and the microseconds past its millisecond.
 */
export interface InstantParts {
    at: Date;
    micros: number;
}

const instantTextSchema = z.union([z.string().date(), z.string().datetime({ offset: true, local: true })]);

// `hh:mm` gets `:00` appended before validation
const MINUTE_PRECISION_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2})(?=$|Z|[+-])/;

const INSTANT_PARTS_PATTERN =
    /^(\d{4})-(\d{2})-(\d{2})(?:T(\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?)?(Z|([+-])(\d{2})(?::?(\d{2}))?)?$/;

export function joinInstant(at: Date, micros: number): Instant {
    return `${at.toISOString().slice(0, -1)}${String(micros).padStart(3, '0')}Z`;
}

export function splitInstant(instant: Instant): InstantParts {
    return {
        at: new Date(`${instant.slice(0, 23)}Z`),
        micros: Number(instant.slice(23, 26)),
    };
}

/**
 * Parses an ISO-8601 date or date-time.
 *
 * A bare date means midnight UTC and a date-time without offset is read as UTC.
 * Fractions beyond microseconds are truncated.
 */
export function parseInstant(raw: string): ParseResult<Instant> {
    const text = raw.trim().replace(MINUTE_PRECISION_PATTERN, '$1:00');
    if (!text) {
        return rejected('missing');
    }

    const match = instantTextSchema.safeParse(text).success ? INSTANT_PARTS_PATTERN.exec(text) : null;
    if (!match) {
        return rejected('malformed');
    }

    const [
        ,
        year,
        month,
        day,
        hour = '0',
        minute = '0',
        second = '0',
        fraction = '',
        ,
        sign,
        offsetHours = '0',
        offsetMinutes = '0',
    ] = match;
    const digits = fraction.padEnd(6, '0');

    const local = new Date(0);
    local.setUTCFullYear(Number(year), Number(month) - 1, Number(day));
    local.setUTCHours(Number(hour), Number(minute), Number(second), Number(digits.slice(0, 3)));

    const offset = (sign === '-' ? -1 : 1) * (Number(offsetHours) * 60 + Number(offsetMinutes));
    return parsed(joinInstant(new Date(local.getTime() - offset * 60_000), Number(digits.slice(3, 6))));
}

/**
 * No fraction on whole seconds, otherwise all six digits.
 */
export function formatInstant(instant: Instant): string {
    return instant.replace(/\.000000Z$/, 'Z');
}
