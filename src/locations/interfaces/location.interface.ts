/**
 * @fileoverview Location Interfaces
 */

import { GeoPoint } from '../../shared/geo';
import { Instant, InstantRange } from '../../shared/parsing';

/**
 * A timestamped sighting of a character.
 */
export interface Location {
    id: number;
    /** Owning character id */
    character: number;
    timestamp: Instant;
    /** Rounded to six fractional digits */
    lat: number;
    lon: number;
}

export type LocationDraft = Omit<Location, 'id'>;

export interface LocationWithDistance extends Location {
    /** Meters from the query origin */
    distance: number;
}

/**
 * Raw `/locations/near/` query as received over HTTP.
 */
export interface LocationNearQuery {
    coordinates?: string;
    distance?: string;
    ascending?: string;
    character?: string;
    date_range?: string;
}

export interface NearbyCriteria {
    origin: GeoPoint;
    maxDistance: number;
    ascending: boolean;
    character?: number;
    period?: InstantRange;
}
