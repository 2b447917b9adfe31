/**
 * @fileoverview Great-Circle Distance
 *
 * Spherical law of cosines on a sphere of radius 6,371 km.
 */

import { roundToScale } from './coordinates';

export const EARTH_RADIUS_METERS = 6_371_000;

export interface GeoPoint {
    lat: number;
    lon: number;
}

const toRadians = (degrees: number): number => (degrees * Math.PI) / 180;

/**
 * Distance in meters between two points, rounded to six decimals.
 */
export function greatCircleDistance(from: GeoPoint, to: GeoPoint): number {
    if (from.lat === to.lat && from.lon === to.lon) {
        return 0;
    }

    const phi1 = toRadians(from.lat);
    const phi2 = toRadians(to.lat);
    const deltaLambda = toRadians(to.lon) - toRadians(from.lon);

    const cosine = Math.cos(phi1) * Math.cos(phi2) * Math.cos(deltaLambda) + Math.sin(phi1) * Math.sin(phi2);

    // Rounding can push the sum past ±1 for near-coincident or antipodal points.
    const centralAngle = Math.acos(Math.min(1, Math.max(-1, cosine)));

    return roundToScale(centralAngle * EARTH_RADIUS_METERS, 6);
}
