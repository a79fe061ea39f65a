import type { Command, CommandOutcome } from '../commands/types';
import { CommandDispatcher } from '../commands/dispatcher';
import type {
  AssistantGateway,
  AssistantReply,
  ConfirmationCollaborator,
  GenerationCollaborator,
  NodeSelection,
  ResearchCollaborator,
  TreeStore
} from '../core/collaborators';
import type { ConversationTurn, TurnRole } from '../core/context';
import { GatewayError, describeError } from '../core/errors';
import { EventBus, type Listener } from '../core/event-bus';
import type { CommandOutcomeEvent, EngineEvents } from '../core/events';
import { FSM, ProcessingState } from '../core/fsm';
import { HistoryLedger, clip } from '../core/history-ledger';
import { config } from '../config';
import { logger } from '../observability/logger';
import { validateAssistantReply } from './assistant-response';
import { ContextAssembler } from './context-assembler';

const log = logger.child('orchestrator');

export type SubmitResult = 'accepted' | 'busy' | 'empty' | 'too_long';

export type OrchestratorDeps = {
  tree: TreeStore;
  selection: NodeSelection;
  gateway: AssistantGateway;
  generator: GenerationCollaborator;
  researcher: ResearchCollaborator;
  confirmation: ConfirmationCollaborator;
};

export type OrchestratorOptions = {
  maxMessageLength?: number;
  historyCapacity?: number;
  contextHistorySize?: number;
  researchFollowUpDepth?: number;
  temperature?: number;
  maxTokens?: number;
  now?: () => number;
};

export class ConversationOrchestrator {
  private fsm = new FSM();
  private events = new EventBus<EngineEvents>();
  private ledger: HistoryLedger;
  private assembler: ContextAssembler;
  private dispatcher: CommandDispatcher;
  private gateway: AssistantGateway;
  private selection: NodeSelection;
  private maxMessageLength: number;
  private researchFollowUpDepth: number;
  private last: Command | undefined;
  private turnSeq = 0;
  // set while Idle is published ahead of a research follow-up that owns the next turn
  private followUpReserved = false;

  constructor(deps: OrchestratorDeps, opts: OrchestratorOptions = {}) {
    this.maxMessageLength = opts.maxMessageLength ?? config.maxMessageLength;
    this.researchFollowUpDepth = opts.researchFollowUpDepth ?? config.researchFollowUpDepth;
    this.ledger = new HistoryLedger({
      capacity: opts.historyCapacity ?? config.historyCapacity,
      maxTextLength: this.maxMessageLength,
      now: opts.now
    });
    this.assembler = new ContextAssembler(deps.tree, this.ledger, opts.contextHistorySize ?? config.contextHistorySize);
    this.dispatcher = new CommandDispatcher({
      tree: deps.tree,
      selection: deps.selection,
      generator: deps.generator,
      researcher: deps.researcher,
      confirmation: deps.confirmation,
      generation: {
        temperature: opts.temperature ?? config.generationTemperature,
        maxTokens: opts.maxTokens ?? config.generationMaxTokens
      }
    });
    this.gateway = deps.gateway;
    this.selection = deps.selection;
  }

  get state(): ProcessingState {
    return this.fsm.state;
  }

  get lastCommand(): Command | undefined {
    return this.last;
  }

  get history(): ConversationTurn[] {
    return this.ledger.all();
  }

  onTurnAppended(listener: Listener<ConversationTurn>) {
    return this.events.on('turnAppended', listener);
  }

  onProcessingStateChanged(listener: Listener<ProcessingState>) {
    return this.events.on('processingStateChanged', listener);
  }

  onCommandOutcome(listener: Listener<CommandOutcomeEvent>) {
    return this.events.on('commandOutcome', listener);
  }

  /** Resolves once the turn, and any research follow-up it triggered, has finished. */
  submit(utterance: string): Promise<SubmitResult> {
    return this.run(utterance, 0);
  }

  private async run(utterance: string, depth: number): Promise<SubmitResult> {
    // nothing may await before the flag is taken
    if (this.fsm.state !== ProcessingState.IDLE || this.followUpReserved) {
      log.debug('submit rejected while processing');
      return 'busy';
    }
    const text = utterance.trim();
    if (text.length === 0) return 'empty';
    if (text.length > this.maxMessageLength) {
      this.record('system', `message too long: ${text.length} characters exceeds the ${this.maxMessageLength} limit`);
      return 'too_long';
    }
    if (!this.fsm.tryBegin()) return 'busy';
    this.events.emit('processingStateChanged', this.fsm.state);

    const turnId = ++this.turnSeq;
    const followUps: string[] = [];
    log.info('turn start', { turn: turnId, depth, len: text.length });
    try {
      this.record('user', text);
      const context = await this.assembler.assemble(this.selection.get(), this.last);

      let reply: AssistantReply;
      try {
        reply = validateAssistantReply(await this.gateway.send(text, context));
      } catch (err) {
        throw err instanceof GatewayError ? err : new GatewayError(describeError(err), err);
      }
      this.record('assistant', reply.replyText);

      // sequential: later commands see the selection earlier ones left behind
      for (const command of reply.commands) {
        const outcome = await this.dispatcher.execute(command);
        this.events.emit('commandOutcome', { command, outcome });
        if (outcome.ok) {
          if (outcome.followUp) followUps.push(outcome.followUp);
        } else {
          this.record('system', describeFailure(command, outcome));
        }
      }
      const final = reply.commands[reply.commands.length - 1];
      if (final) this.last = final;
    } catch (err) {
      log.warn('turn failed', { turn: turnId, error: describeError(err) });
      const prefix = err instanceof GatewayError ? 'Assistant request failed' : 'Turn failed';
      this.record('system', `${prefix}: ${describeError(err)}`);
    } finally {
      this.assembler.endTurn();
      this.fsm.finish();
      this.followUpReserved = followUps.length > 0 && depth < this.researchFollowUpDepth;
      this.events.emit('processingStateChanged', this.fsm.state);
      log.info('turn end', { turn: turnId });
    }

    if (this.followUpReserved) {
      this.followUpReserved = false;
      await this.run(clip(followUps.join('\n\n'), this.maxMessageLength), depth + 1);
    } else if (followUps.length > 0) {
      log.info('research follow-up skipped', { turn: turnId, depth });
    }
    return 'accepted';
  }

  private record(role: TurnRole, text: string) {
    const turn = this.ledger.record(role, text);
    this.events.emit('turnAppended', turn);
  }
}

function describeFailure(command: Command, outcome: Extract<CommandOutcome, { ok: false }>): string {
  if (outcome.error === 'cancelled' || outcome.error === 'unsupported') return outcome.message;
  return `${command.kind} failed (${outcome.error}): ${outcome.message}`;
}
