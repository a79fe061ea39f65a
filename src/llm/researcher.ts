import type { ResearchCollaborator, ResearchResults } from '../core/collaborators';
import type { ChatCompleter } from './llm-base';
import { RESEARCH_SYSTEM_PROMPT } from './prompts';

export class LlmResearcher implements ResearchCollaborator {
  private llm: ChatCompleter;

  constructor(llm: ChatCompleter) {
    this.llm = llm;
  }

  async research(query: string): Promise<ResearchResults> {
    const summary = await this.llm.complete(
      [
        { role: 'system', content: RESEARCH_SYSTEM_PROMPT },
        { role: 'user', content: query }
      ],
      { temperature: 0.2 }
    );
    return { query, summary: summary.trim() };
  }
}
