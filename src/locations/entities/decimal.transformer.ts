import { ValueTransformer } from 'typeorm';

/**
 * pg hands numeric columns back as strings.
 */
export const decimalTransformer: ValueTransformer = {
    to: (value: number | null | undefined) => value,
    from: (value: string | null) => (value === null ? null : Number(value)),
};
