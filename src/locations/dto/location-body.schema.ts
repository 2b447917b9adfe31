/**
 * @fileoverview Location Body Schemas
 */

import { z } from 'zod';
import { coordinateField, instantField, recordBody, recordReferenceField } from '../../shared/validation';

export const locationReplaceSchema = recordBody({
    character: recordReferenceField(),
    timestamp: instantField(),
    lat: coordinateField(),
    lon: coordinateField(),
});

export const locationPatchSchema = locationReplaceSchema.partial();

export type LocationReplaceBody = z.output<typeof locationReplaceSchema>;
export type LocationPatchBody = z.output<typeof locationPatchSchema>;
