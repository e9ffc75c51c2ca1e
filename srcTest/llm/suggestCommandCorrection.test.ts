import { describe, expect, it, vi } from 'vitest';

import { suggestCommandCorrection } from '../../src/utils/llm/suggestCommandCorrection';
import type { LlmChatCapability } from '../../src/utils/llm/llmChatCapability';

const commands = ['add-note', 'list-notes', 'search-tag'];

const makeLlm = (reply: string): LlmChatCapability => ({
    provider: 'openrouter',
    model: 'test-model',
    chat: vi.fn(async () => reply),
});

describe('suggestCommandCorrection', () => {
    it('returns null without an llm', async () => {
        expect(await suggestCommandCorrection({ input: 'ad-note', commands, llm: null })).toBeNull();
    });

    it('accepts a quoted known command', async () => {
        const llm = makeLlm(' "add-note" ');
        expect(await suggestCommandCorrection({ input: 'ad-note', commands, llm })).toBe('add-note');
    });

    it('drops guesses outside the command list', async () => {
        expect(await suggestCommandCorrection({ input: 'fly', commands, llm: makeLlm('fly') })).toBeNull();
        expect(await suggestCommandCorrection({ input: 'zzz', commands, llm: makeLlm('') })).toBeNull();
    });
});
