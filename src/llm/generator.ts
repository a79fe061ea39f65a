import type { GenerationCollaborator, GenerationOptions } from '../core/collaborators';
import type { ChatCompleter } from './llm-base';
import { GENERATION_SYSTEM_PROMPT } from './prompts';

export class OpenAiTextGenerator implements GenerationCollaborator {
  private llm: ChatCompleter;

  constructor(llm: ChatCompleter) {
    this.llm = llm;
  }

  async generateText(prompt: string, options: GenerationOptions): Promise<string> {
    const text = await this.llm.complete(
      [
        { role: 'system', content: GENERATION_SYSTEM_PROMPT },
        { role: 'user', content: prompt }
      ],
      { temperature: options.temperature, maxTokens: options.maxTokens }
    );
    return text.trim();
  }
}
