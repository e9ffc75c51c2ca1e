import { describe, expect, it, vi } from 'vitest';

import { GeneralNote } from '../../src/utils/noteBook/GeneralNote';
import {
    buildNoteCatalog,
    createSemanticNoteSearcher,
    parseNotePositions,
} from '../../src/utils/llm/semanticNoteSearch';
import type { LlmChatCapability } from '../../src/utils/llm/llmChatCapability';

const makeLlm = (reply: string) => {
    const chat = vi.fn<LlmChatCapability['chat']>(async () => reply);
    const llm: LlmChatCapability = {
        provider: 'groq',
        model: 'test-model',
        chat,
    };
    return { llm, chat };
};

describe('semanticNoteSearch', () => {
    it('numbers notes with their tags', () => {
        const notes = [
            new GeneralNote('first', ['a', 'b']),
            new GeneralNote('second'),
        ];
        expect(buildNoteCatalog(notes)).toBe('1: first  [tags: a, b]\n2: second  [tags: —]');
    });

    it('keeps distinct positions inside the catalog', () => {
        expect(parseNotePositions('2, 5 and 2, 7', 6)).toEqual([2, 5]);
        expect(parseNotePositions('', 6)).toEqual([]);
        expect(parseNotePositions('0 1', 1)).toEqual([1]);
    });

    it('is unavailable without an llm', () => {
        expect(createSemanticNoteSearcher(null)).toBeNull();
    });

    it('sends the catalog and the query, then parses the reply', async () => {
        const { llm, chat } = makeLlm('3 1');
        const searcher = createSemanticNoteSearcher(llm);
        expect(searcher).not.toBeNull();
        if (!searcher) {
            return;
        }

        const notes = [new GeneralNote('one'), new GeneralNote('two'), new GeneralNote('three')];
        expect(await searcher(notes, 'numbers')).toEqual([3, 1]);

        const params = chat.mock.calls[0][0];
        expect(params.temperature).toBe(0);
        expect(params.maxTokens).toBe(20);
        expect(params.messages[1]).toEqual({ role: 'user', content: 'numbers' });
        expect(params.messages[0].content).toContain('3: three  [tags: —]');
    });
});
