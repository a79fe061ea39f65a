import type { Command, CommandOutcome } from '../commands/types';
import type { ConversationTurn } from './context';
import type { ProcessingState } from './fsm';

export interface CommandOutcomeEvent {
  command: Command;
  outcome: CommandOutcome;
}

export interface EngineEvents {
  turnAppended: ConversationTurn;
  processingStateChanged: ProcessingState;
  commandOutcome: CommandOutcomeEvent;
}
