import type { Command } from '../commands/types';
import type { ConversationContext } from './context';

export interface TreeNode {
  id: string;
  parentId: string | null;
  title: string;
  content: string;
}

export interface TreeStore {
  getNode(id: string): Promise<TreeNode | undefined>;
  /** `parentId` undefined creates the node under the root. */
  createNode(parentId: string | undefined, title: string): Promise<TreeNode>;
  updateNode(id: string, content: string): Promise<void>;
  deleteNode(id: string): Promise<boolean>;
  getNodeSummary(id: string): Promise<string | undefined>;
}

/** The current-node reference shared with the presentation layer. */
export interface NodeSelection {
  get(): string | undefined;
  set(id: string): void;
  clear(): void;
}

export interface AssistantReply {
  replyText: string;
  commands: Command[];
}

export interface AssistantGateway {
  send(utterance: string, context: ConversationContext): Promise<AssistantReply>;
}

export type GenerationOptions = {
  temperature: number;
  maxTokens: number;
};

export interface GenerationCollaborator {
  generateText(prompt: string, options: GenerationOptions): Promise<string>;
}

export interface ResearchResults {
  query: string;
  summary: string;
}

export interface ResearchCollaborator {
  research(query: string): Promise<ResearchResults>;
}

export interface ConfirmationCollaborator {
  confirm(title: string, message: string): Promise<boolean>;
}
