/**
 * 1-based list position from a request field: a number or its digit string.
 * Anything else is NaN, which every position check rejects.
 */
const parsePosition = (value: unknown): number => {
    if (typeof value === 'number') {
        return value;
    }
    if (typeof value === 'string' && /^[0-9]+$/.test(value.trim())) {
        return parseInt(value.trim(), 10);
    }
    return NaN;
};

export {
    parsePosition,
};
