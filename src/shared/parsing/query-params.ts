/**
 * @fileoverview Query Parameter Parsers
 *
 * Pure conversions from raw query-string values to typed values. Nothing here
 * throws; callers decide which HTTP error a failed result becomes.
 */

import { GeoPoint } from '../geo/great-circle';
import { ParseResult, parsed, rejected } from './parse-result';
import { Instant, parseInstant } from './temporal';

const DECIMAL_PATTERN = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const RECORD_ID_PATTERN = /^\d+$/;

export interface InstantRange {
    start: Instant;
    end: Instant;
}

/**
 * Reads a single query value; repeated parameters keep their first occurrence.
 */
export function queryValue(raw: unknown): string | undefined {
    if (typeof raw === 'string') {
        return raw;
    }
    if (Array.isArray(raw)) {
        const [first]: unknown[] = raw;
        return typeof first === 'string' ? first : undefined;
    }
    return undefined;
}

function presentText(raw: unknown): ParseResult<string> {
    const value = queryValue(raw);
    return value === undefined || value === '' ? rejected('missing') : parsed(value);
}

export function parseNumber(raw: unknown): ParseResult<number> {
    const text = presentText(raw);
    if (!text.ok) {
        return text;
    }

    const trimmed = text.value.trim();
    if (!DECIMAL_PATTERN.test(trimmed)) {
        return rejected('malformed');
    }

    const value = Number(trimmed);
    return Number.isFinite(value) ? parsed(value) : rejected('malformed');
}

export function parseNonNegativeNumber(raw: unknown): ParseResult<number> {
    const result = parseNumber(raw);
    if (result.ok && result.value < 0) {
        return rejected('malformed');
    }
    return result;
}

/**
 * Positive integer identifiers as issued by the record stores.
 */
export function parseRecordId(raw: unknown): ParseResult<number> {
    const text = presentText(raw);
    if (!text.ok) {
        return text;
    }

    const trimmed = text.value.trim();
    if (!RECORD_ID_PATTERN.test(trimmed)) {
        return rejected('malformed');
    }

    const id = Number(trimmed);
    return Number.isSafeInteger(id) && id > 0 ? parsed(id) : rejected('malformed');
}

export function parseChoice<T extends string>(raw: unknown, choices: readonly T[]): ParseResult<T> {
    const text = presentText(raw);
    if (!text.ok) {
        return text;
    }

    const choice = choices.find((candidate) => candidate === text.value);
    return choice === undefined ? rejected('malformed') : parsed(choice);
}

/**
 * Strict `0`/`1` flag.
 */
export function parseBinaryFlag(raw: unknown): ParseResult<boolean> {
    const flag = parseChoice(raw, ['0', '1'] as const);
    return flag.ok ? parsed(flag.value === '1') : flag;
}

/**
 * Lenient boolean: `true` in any letter case, anything else is false.
 */
export function parseTruthy(raw: unknown): ParseResult<boolean> {
    const text = presentText(raw);
    return text.ok ? parsed(text.value.toLowerCase() === 'true') : text;
}

/**
 * `lat,lon` pair.
 */
export function parseCoordinatePair(raw: unknown): ParseResult<GeoPoint> {
    const text = presentText(raw);
    if (!text.ok) {
        return text;
    }

    const parts = text.value.split(',');
    if (parts.length !== 2) {
        return rejected('malformed');
    }

    const lat = parseNumber(parts[0]);
    const lon = parseNumber(parts[1]);
    if (!lat.ok || !lon.ok) {
        return rejected('malformed');
    }

    return parsed({ lat: lat.value, lon: lon.value });
}

/**
 * `start,end` pair of ISO dates or date-times.
 */
export function parseInstantRange(raw: unknown): ParseResult<InstantRange> {
    const text = presentText(raw);
    if (!text.ok) {
        return text;
    }

    const parts = text.value.split(',');
    if (parts.length !== 2) {
        return rejected('malformed');
    }

    const start = parseInstant(parts[0]);
    const end = parseInstant(parts[1]);
    if (!start.ok || !end.ok) {
        return rejected('malformed');
    }

    return parsed({ start: start.value, end: end.value });
}
