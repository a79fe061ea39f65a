import type {
  ConfirmationCollaborator,
  GenerationCollaborator,
  GenerationOptions,
  NodeSelection,
  ResearchCollaborator,
  TreeStore
} from '../core/collaborators';
import type { CommandKind, CommandOutcome } from './types';

export interface CommandEnv {
  tree: TreeStore;
  selection: NodeSelection;
  generator: GenerationCollaborator;
  researcher: ResearchCollaborator;
  confirmation: ConfirmationCollaborator;
  generation: GenerationOptions;
}

export type CommandHandler = (params: readonly string[], env: CommandEnv) => Promise<CommandOutcome>;

// A Record keyed by the enum, so a kind without a handler does not compile.
export type CommandHandlers = Record<CommandKind, CommandHandler>;

export class CommandRegistry {
  private handlers: CommandHandlers;

  constructor(handlers: CommandHandlers) {
    this.handlers = { ...handlers };
  }

  get(kind: CommandKind): CommandHandler {
    return this.handlers[kind];
  }
}
