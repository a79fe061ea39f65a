import type { Command } from '../commands/types';
import type { TreeStore } from '../core/collaborators';
import type { ConversationContext } from '../core/context';
import type { HistoryLedger } from '../core/history-ledger';
import { describeError } from '../core/errors';
import { logger } from '../observability/logger';

const log = logger.child('context');

export class ContextAssembler {
  private tree: Pick<TreeStore, 'getNodeSummary'>;
  private ledger: HistoryLedger;
  private historySize: number;
  private summaryCache = new Map<string, string>();

  constructor(tree: Pick<TreeStore, 'getNodeSummary'>, ledger: HistoryLedger, historySize = 5) {
    this.tree = tree;
    this.ledger = ledger;
    this.historySize = historySize;
  }

  async assemble(currentNodeId: string | undefined, lastCommand?: Command): Promise<ConversationContext> {
    const context: ConversationContext = {
      currentNodeId,
      lastCommand,
      recentHistory: this.ledger.recent(this.historySize)
    };
    if (currentNodeId) {
      context.currentNodeSummary = await this.summaryFor(currentNodeId);
    }
    return context;
  }

  /** Drops summaries cached during the turn. */
  endTurn() {
    this.summaryCache.clear();
  }

  private async summaryFor(nodeId: string): Promise<string | undefined> {
    const cached = this.summaryCache.get(nodeId);
    if (cached !== undefined) return cached;
    try {
      const summary = await this.tree.getNodeSummary(nodeId);
      if (summary !== undefined) this.summaryCache.set(nodeId, summary);
      return summary;
    } catch (err) {
      log.warn('node summary lookup failed', { nodeId, error: describeError(err) });
      return undefined;
    }
  }
}
