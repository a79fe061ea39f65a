export enum CommandKind {
  CreateNode = 'CreateNode',
  UpdateNode = 'UpdateNode',
  DeleteNode = 'DeleteNode',
  GenerateContent = 'GenerateContent',
  Research = 'Research'
}

/** Positional, kind-specific parameters. Only the gateway response parser builds these. */
export interface Command {
  readonly kind: CommandKind;
  readonly parameters: readonly string[];
}

export type CommandFailureCode = 'validation' | 'precondition' | 'collaborator' | 'unsupported' | 'cancelled';

export type CommandOutcome =
  | { ok: true; detail: string; followUp?: string }
  | { ok: false; error: CommandFailureCode; message: string };
