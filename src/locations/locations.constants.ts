export const NEAR_PARAMS_MESSAGE =
    'The query parameters `coordinates` and `distance` are obligatory. `coordinates` accepts ' +
    'a `latitude,longitude` pair. `distance` accepts any value >= 0';

export const CHARACTER_PARAM_MESSAGE = 'The query parameter `character` only accepts a character id';

export const DATE_RANGE_PARAM_MESSAGE =
    'The query parameter `date_range` accepts a `start,end` pair of ISO dates or datetimes';
