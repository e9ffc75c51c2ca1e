import { parsePosition } from '../common/parsePosition';

export type KeyResolution =
    | { status: 'found'; key: string }
    | { status: 'ambiguous'; candidates: string[] }
    | { status: 'notFound' };

export type KeySelection =
    | { status: 'found'; key: string }
    | { status: 'invalidSelection'; candidates: string[] }
    | { status: 'notFound' };

/**
 * Receives the candidate keys (shown to the user 1-indexed) and answers
 * with the chosen 1-based index, or null for "no selection".
 */
export type DisambiguationPrompt = (candidates: readonly string[]) => number | null;

const makeRecordKey = (name: string, surname = ''): string => {
    return `${name} ${surname}`.trim().toLowerCase();
};

// "john smith jr" -> ['john', 'smith jr']
const splitNameInput = (nameText: string): string[] => {
    const trimmed = nameText.trim();
    if (trimmed.length === 0) {
        return [];
    }
    const match = /^(\S+)\s+([\s\S]+)$/.exec(trimmed);
    if (match) {
        return [match[1], match[2]];
    }
    return [trimmed];
};

const resolveRecordKey = (
    nameText: string,
    keys: Iterable<string>,
): KeyResolution => {
    const tokens = splitNameInput(nameText).map((token) => token.toLowerCase());
    if (tokens.length === 0) {
        return { status: 'notFound' };
    }

    const candidates: string[] = [];
    for (const key of keys) {
        if (tokens.every((token) => key.includes(token))) {
            candidates.push(key);
        }
    }

    if (candidates.length === 0) {
        return { status: 'notFound' };
    }
    if (candidates.length === 1) {
        return { status: 'found', key: candidates[0] };
    }
    return { status: 'ambiguous', candidates };
};

const selectCandidate = (
    candidates: readonly string[],
    selection: number | null,
): KeySelection => {
    if (
        selection !== null &&
        Number.isInteger(selection) &&
        selection >= 1 &&
        selection <= candidates.length
    ) {
        return { status: 'found', key: candidates[selection - 1] };
    }
    return { status: 'invalidSelection', candidates: [...candidates] };
};

/**
 * Resolve with the disambiguation round-trip. Without a prompt an ambiguous
 * match counts as "no selection".
 */
const resolveRecordKeyWithPrompt = (
    nameText: string,
    keys: Iterable<string>,
    prompt?: DisambiguationPrompt,
): KeySelection => {
    const resolution = resolveRecordKey(nameText, keys);
    if (resolution.status !== 'ambiguous') {
        return resolution;
    }
    const selection = prompt ? prompt(resolution.candidates) : null;
    return selectCandidate(resolution.candidates, selection);
};

/**
 * Prompt answering from a value the client already sent, such as the
 * `selection` field of a request body: a positive integer or its digit string.
 */
const selectionPrompt = (value: unknown): DisambiguationPrompt => {
    return () => {
        const selection = parsePosition(value);
        return Number.isNaN(selection) ? null : selection;
    };
};

export {
    makeRecordKey,
    splitNameInput,
    resolveRecordKey,
    selectCandidate,
    resolveRecordKeyWithPrompt,
    selectionPrompt,
};
