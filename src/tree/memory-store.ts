import { randomUUID } from 'crypto';
import type { TreeNode, TreeStore } from '../core/collaborators';

const PREVIEW_CHARS = 200;

export type TreeSnapshot = {
  version: 1;
  nodes: TreeNode[];
};

export class InMemoryTreeStore implements TreeStore {
  // Map iteration keeps creation order
  private nodes = new Map<string, TreeNode>();
  private newId: () => string;

  constructor(newId: () => string = randomUUID) {
    this.newId = newId;
  }

  async getNode(id: string): Promise<TreeNode | undefined> {
    const node = this.nodes.get(id);
    return node ? { ...node } : undefined;
  }

  async createNode(parentId: string | undefined, title: string): Promise<TreeNode> {
    if (parentId !== undefined && !this.nodes.has(parentId)) {
      throw new Error(`parent node ${parentId} does not exist`);
    }
    const node: TreeNode = { id: this.newId(), parentId: parentId ?? null, title, content: '' };
    this.nodes.set(node.id, node);
    return { ...node };
  }

  async updateNode(id: string, content: string): Promise<void> {
    const node = this.nodes.get(id);
    if (!node) throw new Error(`node ${id} does not exist`);
    node.content = content;
  }

  async deleteNode(id: string): Promise<boolean> {
    if (!this.nodes.has(id)) return false;
    for (const childId of this.childIds(id)) {
      await this.deleteNode(childId);
    }
    return this.nodes.delete(id);
  }

  async getNodeSummary(id: string): Promise<string | undefined> {
    const node = this.nodes.get(id);
    if (!node) return undefined;
    const lines = [`Title: ${node.title}`];
    const content = node.content.trim();
    if (content.length > 0) {
      const preview = content.length > PREVIEW_CHARS ? `${content.slice(0, PREVIEW_CHARS)}...` : content;
      lines.push(`Content: ${preview}`);
    }
    const children = this.childIds(id).map((childId) => this.nodes.get(childId)?.title ?? childId);
    if (children.length > 0) {
      lines.push(`Children: ${children.join(', ')}`);
    }
    return lines.join('\n');
  }

  list(): TreeNode[] {
    return [...this.nodes.values()].map((n) => ({ ...n }));
  }

  snapshot(): TreeSnapshot {
    return { version: 1, nodes: this.list() };
  }

  restore(snapshot: TreeSnapshot) {
    this.nodes.clear();
    for (const node of snapshot.nodes) {
      this.nodes.set(node.id, { ...node });
    }
  }

  private childIds(id: string): string[] {
    const ids: string[] = [];
    for (const node of this.nodes.values()) {
      if (node.parentId === id) ids.push(node.id);
    }
    return ids;
  }
}
