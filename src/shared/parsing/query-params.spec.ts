import {
    parseBinaryFlag,
    parseChoice,
    parseCoordinatePair,
    parseInstantRange,
    parseNonNegativeNumber,
    parseNumber,
    parseRecordId,
    parseTruthy,
    queryValue,
} from './query-params';

describe('query parameter parsers', () => {
    describe('queryValue', () => {
        it('should keep the first of repeated values', () => {
            expect(queryValue(['a', 'b'])).toBe('a');
        });

        it('should ignore non-string values', () => {
            expect(queryValue(5)).toBeUndefined();
            expect(queryValue({ nested: 'x' })).toBeUndefined();
        });
    });

    describe('parseNumber', () => {
        it('should parse decimals and exponents', () => {
            expect(parseNumber('1.5')).toEqual({ ok: true, value: 1.5 });
            expect(parseNumber(' 2 ')).toEqual({ ok: true, value: 2 });
            expect(parseNumber('1e3')).toEqual({ ok: true, value: 1000 });
            expect(parseNumber('.5')).toEqual({ ok: true, value: 0.5 });
            expect(parseNumber('-7.')).toEqual({ ok: true, value: -7 });
        });

        it('should report absent values as missing', () => {
            expect(parseNumber(undefined)).toEqual({ ok: false, error: 'missing' });
            expect(parseNumber('')).toEqual({ ok: false, error: 'missing' });
        });

        it('should reject text that is not a finite number', () => {
            expect(parseNumber('abc')).toEqual({ ok: false, error: 'malformed' });
            expect(parseNumber('Infinity')).toEqual({ ok: false, error: 'malformed' });
            expect(parseNumber('0x10')).toEqual({ ok: false, error: 'malformed' });
        });
    });

    describe('parseNonNegativeNumber', () => {
        it('should accept zero', () => {
            expect(parseNonNegativeNumber('0')).toEqual({ ok: true, value: 0 });
        });

        it('should reject negative values', () => {
            expect(parseNonNegativeNumber('-1')).toEqual({ ok: false, error: 'malformed' });
        });
    });

    describe('parseRecordId', () => {
        it('should parse positive integers', () => {
            expect(parseRecordId('12')).toEqual({ ok: true, value: 12 });
        });

        it('should reject zero, signs, fractions and unsafe integers', () => {
            for (const raw of ['0', '-3', '+3', '1.5', 'abc', '99999999999999999999']) {
                expect(parseRecordId(raw)).toEqual({ ok: false, error: 'malformed' });
            }
        });

        it('should report an empty value as missing', () => {
            expect(parseRecordId('')).toEqual({ ok: false, error: 'missing' });
        });
    });

    describe('parseChoice', () => {
        const fields = ['name', 'date_of_birth'] as const;

        it('should accept a listed choice', () => {
            expect(parseChoice('date_of_birth', fields)).toEqual({ ok: true, value: 'date_of_birth' });
        });

        it('should be case sensitive', () => {
            expect(parseChoice('Name', fields)).toEqual({ ok: false, error: 'malformed' });
        });
    });

    describe('parseBinaryFlag', () => {
        it('should map 1 and 0', () => {
            expect(parseBinaryFlag('1')).toEqual({ ok: true, value: true });
            expect(parseBinaryFlag('0')).toEqual({ ok: true, value: false });
        });

        it('should reject other spellings', () => {
            expect(parseBinaryFlag('true')).toEqual({ ok: false, error: 'malformed' });
            expect(parseBinaryFlag(undefined)).toEqual({ ok: false, error: 'missing' });
        });
    });

    describe('parseTruthy', () => {
        it('should treat only "true" in any case as true', () => {
            expect(parseTruthy('TRUE')).toEqual({ ok: true, value: true });
            expect(parseTruthy('yes')).toEqual({ ok: true, value: false });
            expect(parseTruthy('')).toEqual({ ok: false, error: 'missing' });
        });
    });

    describe('parseCoordinatePair', () => {
        it('should split latitude and longitude', () => {
            expect(parseCoordinatePair('10,-20.5')).toEqual({ ok: true, value: { lat: 10, lon: -20.5 } });
        });

        it('should require exactly two numeric parts', () => {
            for (const raw of ['10', '1,2,3', 'a,b', ',5']) {
                expect(parseCoordinatePair(raw)).toEqual({ ok: false, error: 'malformed' });
            }
        });
    });

    describe('parseInstantRange', () => {
        it('should parse a start and end', () => {
            expect(parseInstantRange('2020-01-01,2020-01-31T23:59:59Z')).toEqual({
                ok: true,
                value: {
                    start: '2020-01-01T00:00:00.000000Z',
                    end: '2020-01-31T23:59:59.000000Z',
                },
            });
        });

        it('should reject a single value', () => {
            expect(parseInstantRange('2020-01-01')).toEqual({ ok: false, error: 'malformed' });
        });

        it('should reject an unparseable bound', () => {
            expect(parseInstantRange('2020-01-01,later')).toEqual({ ok: false, error: 'malformed' });
        });
    });
});
