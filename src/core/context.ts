import type { Command } from '../commands/types';

export type TurnRole = 'user' | 'assistant' | 'system';

export interface ConversationTurn {
  readonly seq: number;
  readonly role: TurnRole;
  readonly text: string;
  readonly timestamp: number;
}

/** Snapshot sent to the assistant; rebuilt for every turn and never stored. */
export interface ConversationContext {
  currentNodeId?: string;
  currentNodeSummary?: string;
  lastCommand?: Command;
  recentHistory: ConversationTurn[];
}
