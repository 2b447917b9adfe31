/**
 * @fileoverview Character Body Schemas
 *
 * Request bodies for create (POST), replace (PUT) and partial update (PATCH).
 */

import { z } from 'zod';
import { booleanField, calendarDateField, recordBody, textField } from '../../shared/validation';

const TEXT_MAX_LENGTH = 255;

/**
 * PUT body: `is_suspect` may be left out, in which case the stored value stays.
 */
export const characterReplaceSchema = recordBody({
    name: textField(TEXT_MAX_LENGTH),
    date_of_birth: calendarDateField(),
    occupation: textField(TEXT_MAX_LENGTH),
    is_suspect: booleanField().optional(),
});

export const characterCreateSchema = characterReplaceSchema.extend({
    is_suspect: booleanField().default(false),
});

export const characterPatchSchema = characterReplaceSchema.partial();

export type CharacterCreateBody = z.output<typeof characterCreateSchema>;
export type CharacterReplaceBody = z.output<typeof characterReplaceSchema>;
export type CharacterPatchBody = z.output<typeof characterPatchSchema>;
