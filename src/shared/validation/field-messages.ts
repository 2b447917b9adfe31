export const FieldMessages = {
    required: 'This field is required.',
    nullValue: 'This field may not be null.',
    blank: 'This field may not be blank.',
    notText: 'Not a valid string.',
    maxLength: (limit: number) => `Ensure this field has no more than ${limit} characters.`,
    date: 'Date has wrong format. Use one of these formats instead: YYYY-MM-DD.',
    dateTime:
        'Datetime has wrong format. Use one of these formats instead: YYYY-MM-DDThh:mm[:ss[.uuuuuu]][+HH:MM|-HH:MM|Z].',
    boolean: 'Must be a valid boolean.',
    number: 'A valid number is required.',
    integerDigits: (limit: number) => `Ensure that there are no more than ${limit} digits before the decimal point.`,
    pkType: 'Incorrect type. Expected pk value.',
    pkMissing: (id: number) => `Invalid pk "${id}" - object does not exist.`,
    notObject: 'Invalid data. Expected a dictionary.',
} as const;
