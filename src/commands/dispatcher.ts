import { EngineError, describeError } from '../core/errors';
import { logger } from '../observability/logger';
import { handlers } from './handlers';
import { CommandRegistry, type CommandEnv } from './registry';
import type { Command, CommandFailureCode, CommandOutcome } from './types';

const log = logger.child('commands');

export class CommandDispatcher {
  registry: CommandRegistry;
  private env: CommandEnv;

  constructor(env: CommandEnv, registry = new CommandRegistry(handlers)) {
    this.env = env;
    this.registry = registry;
  }

  async execute(command: Command): Promise<CommandOutcome> {
    const handler = this.registry.get(command.kind);
    try {
      const outcome = await handler(command.parameters, this.env);
      log.debug('command executed', { kind: command.kind, ok: outcome.ok });
      return outcome;
    } catch (err) {
      const error = failureCode(err);
      log.warn('command failed', { kind: command.kind, error, message: describeError(err) });
      return { ok: false, error, message: describeError(err) };
    }
  }
}

function failureCode(err: unknown): CommandFailureCode {
  if (!(err instanceof EngineError)) return 'collaborator';
  switch (err.code) {
    case 'validation':
    case 'precondition':
    case 'unsupported':
    case 'collaborator':
      return err.code;
    case 'gateway':
      return 'collaborator';
  }
}
