import type { LlmChatCapability } from './llmChatCapability';

const buildSystemPrompt = (commands: readonly string[]): string => {
    let prompt = 'You are a CLI assistant that fixes mistyped commands. ';
    prompt += 'User may write RU/UA/EN with typos.\n\n';
    prompt += 'Supported commands:\n';
    prompt += commands.join('\n');
    prompt += '\n\nReturn ONLY the canonical command name or empty string.';
    return prompt;
};

/**
 * Best guess of the canonical command the user meant, or null.
 * Without an llm capability there is never a suggestion.
 */
const suggestCommandCorrection = async ({
    input,
    commands,
    llm,
}: {
    input: string;
    commands: readonly string[];
    llm: LlmChatCapability | null;
}): Promise<string | null> => {
    if (!llm) {
        return null;
    }

    const content = await llm.chat({
        messages: [
            { role: 'system', content: buildSystemPrompt(commands) },
            { role: 'user', content: input },
        ],
        temperature: 0,
        maxTokens: 6,
    });

    const guess = content.trim().replace(/^["']+|["']+$/g, '');
    return commands.includes(guess) ? guess : null;
};

export {
    suggestCommandCorrection,
};
