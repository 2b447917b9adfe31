/**
 * @fileoverview Location Response DTO
 */

import { formatCoordinate } from '../../shared/geo';
import { formatInstant } from '../../shared/parsing';
import { Location } from '../interfaces';

/**
 * Coordinates go out as fixed six-decimal strings, the timestamp as UTC ISO-8601.
 */
export interface LocationResponseDto {
    id: number;
    character: number;
    timestamp: string;
    lat: string;
    lon: string;
}

export function toLocationResponse(location: Location): LocationResponseDto {
    return {
        id: location.id,
        character: location.character,
        timestamp: formatInstant(location.timestamp),
        lat: formatCoordinate(location.lat),
        lon: formatCoordinate(location.lon),
    };
}
