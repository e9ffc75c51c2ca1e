import axios, { AxiosRequestConfig, AxiosResponse, isAxiosError } from 'axios';

export type LlmProvider = 'openrouter' | 'groq';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface Message {
  role: ChatRole;
  content: string;
}

export interface FetchLlmParams {
  provider: LlmProvider;
  apiKey: string;
  // empty string uses the provider's default endpoint
  apiEndpoint: string;
  model: string;
  messages: Message[];
  temperature?: number;
  maxTokens?: number;
  topP?: number;
  headersExtra?: Record<string, string>;
}

export interface FetchLlmResult {
  success: boolean;
  content: string; // best-effort normalized assistant text content
  raw: unknown; // full raw provider response for advanced uses
  error: string; // non-empty when success === false
}

interface ChatCompletionResponse {
  choices?: Array<{
    message?: {
      content?: string | null;
    };
  }>;
}

const defaultEndpointByProvider: Record<LlmProvider, string> = {
  openrouter: 'https://openrouter.ai/api/v1/chat/completions',
  groq: 'https://api.groq.com/openai/v1/chat/completions',
};

/**
 * Normalize OpenAI-style chat completions payload
 */
function buildOpenAiPayload(params: FetchLlmParams) {
  return {
    messages: params.messages,
    model: params.model,
    temperature: params.temperature ?? 1,
    max_tokens: params.maxTokens ?? 2048,
    top_p: params.topP ?? 1,
    stream: false,
  };
}

/**
 * Chat completion against OpenRouter or Groq. Never throws; failures come back
 * with success === false and the error message.
 */
export async function fetchLlmUnified(params: FetchLlmParams): Promise<FetchLlmResult> {
  try {
    const finalApiEndpoint = params.apiEndpoint || defaultEndpointByProvider[params.provider];
    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
    };
    if (params.apiKey) {
      headers['Authorization'] = `Bearer ${params.apiKey}`;
    }
    if (params.headersExtra) {
      Object.assign(headers, params.headersExtra);
    }

    const config: AxiosRequestConfig = {
      method: 'post',
      url: finalApiEndpoint,
      headers,
      data: JSON.stringify(buildOpenAiPayload(params)),
    };

    const response: AxiosResponse<ChatCompletionResponse> = await axios.request(config);
    const content = response.data?.choices?.[0]?.message?.content ?? '';
    return { success: content.length > 0, content, raw: response.data, error: '' };
  } catch (error) {
    console.error('Llm failed error: ', error);
    if (isAxiosError(error)) {
      console.error('Llm failed error data: ', error.response?.data);
      return { success: false, content: '', raw: error.response?.data, error: error.message };
    }
    return { success: false, content: '', raw: null, error: error instanceof Error ? error.message : 'Unknown error' };
  }
}

/**
 * Convenience helper returning only assistant content string.
 */
export async function fetchLlmText(params: FetchLlmParams): Promise<string> {
  const result = await fetchLlmUnified(params);
  return result.content;
}
