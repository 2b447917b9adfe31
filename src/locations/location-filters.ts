/**
 * @fileoverview Location Filtering
 *
 * Independent predicates for the nearby query and the distance ranking
 * applied after them.
 */

import { GeoPoint, greatCircleDistance } from '../shared/geo';
import { InstantRange } from '../shared/parsing';
import { RecordPredicate } from '../shared/repository';
import { Location, LocationWithDistance } from './interfaces';

export function byCharacter(characterId: number): RecordPredicate<Location> {
    return (location) => location.character === characterId;
}

/**
 * Inclusive at both ends.
 */
export function withinPeriod(period: InstantRange): RecordPredicate<Location> {
    return (location) => location.timestamp >= period.start && location.timestamp <= period.end;
}

/**
 * Annotates every candidate with its distance from `origin`, keeps those
 * within `maxDistance` meters and orders them by distance. Equal distances
 * keep the candidates' order.
 */
export function rankByDistance(
    candidates: readonly Location[],
    origin: GeoPoint,
    maxDistance: number,
    ascending: boolean,
): LocationWithDistance[] {
    const direction = ascending ? 1 : -1;

    return candidates
        .map((location) => ({ ...location, distance: greatCircleDistance(origin, location) }))
        .filter((location) => location.distance <= maxDistance)
        .sort((left, right) => direction * (left.distance - right.distance));
}
