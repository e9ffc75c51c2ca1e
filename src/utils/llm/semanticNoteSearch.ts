import type { GeneralNote } from '../noteBook/GeneralNote';
import type { SemanticNoteSearcher } from '../noteBook/NoteSearchService';
import type { LlmChatCapability } from './llmChatCapability';

const SEMANTIC_SEARCH_PROMPT = `You are a semantic search assistant.
Below is a numbered list of notes. Each note has the format
<index>: <text>  [tags: <tag1>, <tag2>, ...]

User will send a search query in Russian, Ukrainian or English.
Return ONLY the indices (space-separated) of up to five notes
that are truly relevant. If nothing fits, return an empty string.
`;

const buildNoteCatalog = (notes: readonly GeneralNote[]): string => {
    return notes
        .map((note, index) => {
            const tags = note.tags.length >= 1 ? note.tags.join(', ') : '—';
            return `${index + 1}: ${note.text}  [tags: ${tags}]`;
        })
        .join('\n');
};

// "2, 5 and 7" -> [2, 5, 7]; only positions inside the catalog are kept
const parseNotePositions = (content: string, noteCount: number): number[] => {
    const positions: number[] = [];
    for (const match of content.matchAll(/\d+/g)) {
        const position = parseInt(match[0], 10);
        if (position >= 1 && position <= noteCount && !positions.includes(position)) {
            positions.push(position);
        }
    }
    return positions;
};

const createSemanticNoteSearcher = (llm: LlmChatCapability | null): SemanticNoteSearcher | null => {
    if (!llm) {
        return null;
    }
    return async (notes, query) => {
        const content = await llm.chat({
            messages: [
                { role: 'system', content: `${SEMANTIC_SEARCH_PROMPT}\n${buildNoteCatalog(notes)}` },
                { role: 'user', content: query },
            ],
            temperature: 0,
            topP: 0.1,
            maxTokens: 20,
        });
        return parseNotePositions(content, notes.length);
    };
};

export {
    buildNoteCatalog,
    parseNotePositions,
    createSemanticNoteSearcher,
};
