/**
 * @fileoverview Fixed-Point Coordinates
 *
 * Latitudes and longitudes are stored as numeric(9,6): six fractional digits,
 * at most three integer digits.
 */

export const COORDINATE_PRECISION = 9;
export const COORDINATE_SCALE = 6;

export const COORDINATE_INTEGER_DIGITS = COORDINATE_PRECISION - COORDINATE_SCALE;

/**
 * Rounds half away from zero to `scale` fractional digits.
 */
export function roundToScale(value: number, scale: number): number {
    const factor = 10 ** scale;
    return (Math.sign(value) * Math.round(Math.abs(value) * factor)) / factor;
}

export function roundCoordinate(value: number): number {
    return roundToScale(value, COORDINATE_SCALE);
}

export function fitsCoordinatePrecision(value: number): boolean {
    return Math.abs(value) < 10 ** COORDINATE_INTEGER_DIGITS;
}

export function formatCoordinate(value: number): string {
    return value.toFixed(COORDINATE_SCALE);
}
