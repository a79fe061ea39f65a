import OpenAI from 'openai';
import { config } from '../config';

export type ChatMessage = { role: 'system' | 'user' | 'assistant'; content: string };

export type CompletionOptions = {
  temperature?: number;
  maxTokens?: number;
  json?: boolean;
  signal?: AbortSignal;
};

export interface ChatCompleter {
  complete(messages: ChatMessage[], opts?: CompletionOptions): Promise<string>;
}

export class LLMClient implements ChatCompleter {
  private client: OpenAI;
  private model: string;

  constructor(client?: OpenAI) {
    this.client =
      client ??
      new OpenAI({
        apiKey: config.openaiApiKey,
        baseURL: config.openaiBaseUrl,
        timeout: config.assistantTimeoutMs,
        maxRetries: 0
      });
    this.model = config.openaiModel;
  }

  async complete(messages: ChatMessage[], opts: CompletionOptions = {}): Promise<string> {
    const completion = await this.client.chat.completions.create(
      {
        model: this.model,
        messages,
        temperature: opts.temperature,
        max_tokens: opts.maxTokens,
        response_format: opts.json ? { type: 'json_object' } : undefined
      },
      { signal: opts.signal }
    );

    const content = completion.choices[0]?.message?.content;
    if (!content) {
      throw new Error('assistant returned an empty completion');
    }
    return content;
  }
}
