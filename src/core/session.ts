import type {
  AssistantGateway,
  ConfirmationCollaborator,
  GenerationCollaborator,
  ResearchCollaborator
} from './collaborators';
import type { AutoSaveTask } from './auto-save';
import { describeError } from './errors';
import { ConversationOrchestrator, type OrchestratorOptions, type SubmitResult } from '../orchestrator/orchestrator';
import type { InMemoryTreeStore } from '../tree/memory-store';
import { CurrentNodeRef } from '../tree/selection';
import { config } from '../config';
import { logger } from '../observability/logger';

const log = logger.child('session');

const nowMs = () => Date.now();

export type SendJson = (payload: Record<string, unknown>) => Promise<void>;

export type SessionDeps = {
  tree: InMemoryTreeStore;
  gateway: AssistantGateway;
  generator: GenerationCollaborator;
  researcher: ResearchCollaborator;
  /** Shared by every session on the same tree; the session only flushes it on stop. */
  autoSave?: AutoSaveTask;
  confirmTimeoutMs?: number;
  engine?: OrchestratorOptions;
};

type PendingConfirm = {
  resolve: (accepted: boolean) => void;
  timer: NodeJS.Timeout;
};

export class EditorSession implements ConfirmationCollaborator {
  sessionId: string;
  sendJson: SendJson;

  private tree: InMemoryTreeStore;
  private selection = new CurrentNodeRef();
  private orchestrator: ConversationOrchestrator;
  private autoSave: AutoSaveTask | null;
  private confirmTimeoutMs: number;
  private pendingConfirms = new Map<string, PendingConfirm>();
  private confirmSeq = 0;
  private unsubscribers: Array<() => void> = [];
  private ended = false;

  constructor(sessionId: string, sendJson: SendJson, deps: SessionDeps) {
    this.sessionId = sessionId;
    this.sendJson = sendJson;
    this.tree = deps.tree;
    this.confirmTimeoutMs = deps.confirmTimeoutMs ?? config.confirmTimeoutMs;
    this.autoSave = deps.autoSave ?? null;
    this.orchestrator = new ConversationOrchestrator(
      {
        tree: deps.tree,
        selection: this.selection,
        gateway: deps.gateway,
        generator: deps.generator,
        researcher: deps.researcher,
        confirmation: this
      },
      deps.engine
    );
  }

  async start() {
    log.info('session start', { sid: this.sessionId });
    this.unsubscribers.push(
      this.orchestrator.onTurnAppended((turn) => {
        this.post({ type: 'turn', seq: turn.seq, role: turn.role, text: turn.text, ts_ms: turn.timestamp });
      }),
      this.orchestrator.onProcessingStateChanged((state) => {
        this.post({ type: 'state', state });
      }),
      this.orchestrator.onCommandOutcome(({ command, outcome }) => {
        this.post({ type: 'command', kind: command.kind, parameters: [...command.parameters], outcome });
        this.post(this.treePayload());
      })
    );
    await this.sendJson({ type: 'ready', session_id: this.sessionId });
    await this.sendJson(this.treePayload());
  }

  async stop(reason = 'stop') {
    if (this.ended) return;
    this.ended = true;
    log.info('session stop requested', { sid: this.sessionId, reason });
    for (const unsubscribe of this.unsubscribers.splice(0)) unsubscribe();
    for (const [id, pending] of this.pendingConfirms) {
      clearTimeout(pending.timer);
      pending.resolve(false);
      this.pendingConfirms.delete(id);
    }
    await this.autoSave?.flush();
    try {
      await this.sendJson({ type: 'end', reason });
    } catch {
      // ignore send failures during shutdown
    }
  }

  async chat(text: string): Promise<SubmitResult> {
    if (this.ended) return 'busy';
    return this.orchestrator.submit(text);
  }

  async select(nodeId: string | null) {
    if (nodeId === null) {
      this.selection.clear();
    } else if (await this.tree.getNode(nodeId)) {
      this.selection.set(nodeId);
    } else {
      await this.sendJson({ type: 'error', code: 'UNKNOWN_NODE', message: `no node with id ${nodeId}` });
      return;
    }
    await this.sendJson({ type: 'selection', node_id: this.selection.get() ?? null });
  }

  async sendTree() {
    await this.sendJson(this.treePayload());
  }

  confirm(title: string, message: string): Promise<boolean> {
    if (this.ended) return Promise.resolve(false);
    const id = `c${++this.confirmSeq}`;
    return new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => {
        log.warn('confirmation timed out', { sid: this.sessionId, id });
        this.resolveConfirm(id, false);
      }, this.confirmTimeoutMs);
      this.pendingConfirms.set(id, { resolve, timer });
      this.post({ type: 'confirm', id, title, message, ts_ms: nowMs() });
    });
  }

  /** False when no confirmation with that id is waiting. */
  resolveConfirm(id: string, accepted: boolean): boolean {
    const pending = this.pendingConfirms.get(id);
    if (!pending) return false;
    clearTimeout(pending.timer);
    this.pendingConfirms.delete(id);
    pending.resolve(accepted);
    return true;
  }

  private treePayload(): Record<string, unknown> {
    return { type: 'tree', nodes: this.tree.list(), selected: this.selection.get() ?? null };
  }

  private post(payload: Record<string, unknown>) {
    this.sendJson(payload).catch((err) => {
      log.warn('session send failed', { sid: this.sessionId, type: payload.type, error: describeError(err) });
    });
  }
}
