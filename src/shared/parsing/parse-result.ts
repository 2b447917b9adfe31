/**
 * @fileoverview Parse Result
 *
 * Outcome of turning raw request text into a typed value without throwing.
 */

export type ParseErrorKind = 'missing' | 'malformed';

export type ParseResult<T> =
    | { ok: true; value: T }
    | { ok: false; error: ParseErrorKind };

export const parsed = <T>(value: T): ParseResult<T> => ({ ok: true, value });

export const rejected = <T>(error: ParseErrorKind): ParseResult<T> => ({ ok: false, error });
