export const ORDERING_PARAMS_MESSAGE =
    'The query parameters `orderBy` and `ascending` are obligatory. `orderBy` only accepts ' +
    '`name` and `date_of_birth`. `ascending` only accepts 0 or 1';
