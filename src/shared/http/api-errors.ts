/**
 * @fileoverview API Error Responses
 *
 * Every error body carries a `detail` message; field validation failures add
 * an `errors` map. Nest serialises the response object of an HttpException
 * as-is, so no custom filter is involved.
 */

import { BadRequestException, NotFoundException, UnprocessableEntityException } from '@nestjs/common';
import { FieldErrors } from '../validation/fields';

export const NOT_FOUND_DETAIL = 'Not found.';
export const INVALID_INPUT_DETAIL = 'Invalid input.';

export interface DetailBody {
    detail: string;
}

export interface FieldErrorBody extends DetailBody {
    errors: FieldErrors;
}

export function recordNotFound(): NotFoundException {
    return new NotFoundException({ detail: NOT_FOUND_DETAIL } satisfies DetailBody);
}

export function invalidFields(errors: FieldErrors): BadRequestException {
    return new BadRequestException({ detail: INVALID_INPUT_DETAIL, errors } satisfies FieldErrorBody);
}

export function badQuery(detail: string): BadRequestException {
    return new BadRequestException({ detail } satisfies DetailBody);
}

export function unprocessableQuery(detail: string): UnprocessableEntityException {
    return new UnprocessableEntityException({ detail } satisfies DetailBody);
}
