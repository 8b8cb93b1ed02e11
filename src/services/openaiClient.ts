import OpenAI from 'openai';

const DEFAULT_TEMPERATURE = 0.7;

export type ChatRole = 'system' | 'user' | 'assistant';

export interface ChatCompletionParams {
  messages: Array<{ role: ChatRole; content: string }>;
  temperature?: number;
  maxTokens?: number;
}

/** Resolves to the trimmed reply text; rejects on any failure */
export type ChatCompleter = (params: ChatCompletionParams) => Promise<string>;

export interface ChatCompleterOptions {
  apiKey?: string;
  model: string;
  fallbackModel?: string;
}

function isModelUnavailable(error: unknown): boolean {
  return error instanceof OpenAI.APIError && error.code === 'model_not_found';
}

export function createChatCompleter(options: ChatCompleterOptions): ChatCompleter {
  let client: OpenAI | null = null;

  const getClient = (): OpenAI => {
    if (!options.apiKey) {
      throw new Error('OPENAI_API_KEY is required but not configured');
    }
    client ??= new OpenAI({ apiKey: options.apiKey });
    return client;
  };

  const complete = async (model: string, params: ChatCompletionParams): Promise<string> => {
    const response = await getClient().chat.completions.create({
      model,
      messages: params.messages,
      temperature: params.temperature ?? DEFAULT_TEMPERATURE,
      max_tokens: params.maxTokens,
    });

    const content = response.choices[0]?.message?.content;
    if (!content || content.trim() === '') {
      throw new Error('No response content from OpenAI');
    }
    return content.trim();
  };

  return async (params) => {
    try {
      return await complete(options.model, params);
    } catch (error) {
      if (options.fallbackModel && isModelUnavailable(error)) {
        console.warn(`[OPENAI] Model ${options.model} unavailable, falling back to ${options.fallbackModel}`);
        return complete(options.fallbackModel, params);
      }
      throw error;
    }
  };
}
