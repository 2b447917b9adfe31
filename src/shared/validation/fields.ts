/**
 * @fileoverview Request Body Field Schemas
 *
 * Zod building blocks for record bodies, and the error map that turns zod
 * issues into per-field messages.
 */

import { z } from 'zod';
import { COORDINATE_INTEGER_DIGITS, fitsCoordinatePrecision, roundCoordinate } from '../geo/coordinates';
import { parseNumber, parseRecordId } from '../parsing/query-params';
import { parseInstant } from '../parsing/temporal';
import { FieldMessages } from './field-messages';

export type FieldErrors = Record<string, string[]>;

const TRUE_VALUES = new Set(['true', 't', 'yes', 'y', 'on', '1']);
const FALSE_VALUES = new Set(['false', 'f', 'no', 'n', 'off', '0']);

/**
 * Absent and null values get the same wording on every field; everything
 * else keeps the message chosen by the field schema.
 */
export const fieldErrorMap: z.ZodErrorMap = (_issue, ctx) => {
    if (ctx.data === undefined) {
        return { message: FieldMessages.required };
    }
    if (ctx.data === null) {
        return { message: FieldMessages.nullValue };
    }
    return { message: ctx.defaultError };
};

const withMessage = (message: string): { errorMap: z.ZodErrorMap } => ({
    errorMap: () => ({ message }),
});

export const textField = (maxLength: number) =>
    z
        .string(withMessage(FieldMessages.notText))
        .trim()
        .min(1, FieldMessages.blank)
        .max(maxLength, FieldMessages.maxLength(maxLength));

export const calendarDateField = () =>
    z.string(withMessage(FieldMessages.date)).trim().date(FieldMessages.date);

export const instantField = () =>
    z.string(withMessage(FieldMessages.dateTime)).transform((value, ctx) => {
        const instant = parseInstant(value);
        if (!instant.ok) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.dateTime });
            return z.NEVER;
        }
        return instant.value;
    });

export const booleanField = () =>
    z.union([z.boolean(), z.number(), z.string()], withMessage(FieldMessages.boolean)).transform((value, ctx) => {
        if (typeof value === 'boolean') {
            return value;
        }

        const text = String(value).trim().toLowerCase();
        if (TRUE_VALUES.has(text)) {
            return true;
        }
        if (FALSE_VALUES.has(text)) {
            return false;
        }

        ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.boolean });
        return z.NEVER;
    });

/**
 * numeric(9,6) coordinate, rounded to six fractional digits on the way in.
 */
export const coordinateField = () =>
    z.union([z.number(), z.string()], withMessage(FieldMessages.number)).transform((value, ctx) => {
        const number = parseNumber(String(value));
        if (!number.ok) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.number });
            return z.NEVER;
        }

        const rounded = roundCoordinate(number.value);
        if (!fitsCoordinatePrecision(rounded)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: FieldMessages.integerDigits(COORDINATE_INTEGER_DIGITS),
            });
            return z.NEVER;
        }

        return rounded;
    });

/**
 * Primary key of another record. Existence is checked by the caller.
 */
export const recordReferenceField = () =>
    z.union([z.number(), z.string()], withMessage(FieldMessages.pkType)).transform((value, ctx) => {
        if (value === '') {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.nullValue });
            return z.NEVER;
        }

        const id = parseRecordId(String(value));
        if (!id.ok) {
            ctx.addIssue({ code: z.ZodIssueCode.custom, message: FieldMessages.pkType });
            return z.NEVER;
        }

        return id.value;
    });

export const recordBody = <T extends z.ZodRawShape>(shape: T) => z.object(shape, withMessage(FieldMessages.notObject));

export function toFieldErrors(error: z.ZodError): FieldErrors {
    const errors: FieldErrors = {};

    for (const issue of error.issues) {
        const field = issue.path.length > 0 ? String(issue.path[0]) : 'non_field_errors';
        (errors[field] ??= []).push(issue.message);
    }

    return errors;
}

export type BodyValidation<T> = { success: true; data: T } | { success: false; errors: FieldErrors };

/**
 * Validates a request body against a record schema.
 */
export function validateBody<T extends z.ZodTypeAny>(schema: T, body: unknown): BodyValidation<z.output<T>> {
    const result = schema.safeParse(body, { errorMap: fieldErrorMap });
    if (!result.success) {
        return { success: false, errors: toFieldErrors(result.error) };
    }
    return { success: true, data: result.data };
}
