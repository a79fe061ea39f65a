import type { AssistantGateway, AssistantReply } from '../core/collaborators';
import type { ConversationContext, ConversationTurn } from '../core/context';
import { GatewayError, describeError } from '../core/errors';
import { logger } from '../observability/logger';
import { parseAssistantPayload } from '../orchestrator/assistant-response';
import type { ChatCompleter, ChatMessage } from './llm-base';
import { ASSISTANT_SYSTEM_PROMPT, describeContext } from './prompts';

const log = logger.child('gateway');

export class OpenAiAssistantGateway implements AssistantGateway {
  private llm: ChatCompleter;

  constructor(llm: ChatCompleter) {
    this.llm = llm;
  }

  async send(utterance: string, context: ConversationContext): Promise<AssistantReply> {
    const messages = buildMessages(utterance, context);
    let raw: string;
    try {
      raw = await this.llm.complete(messages, { json: true });
    } catch (err) {
      throw new GatewayError(`assistant request failed: ${describeError(err)}`, err);
    }
    const reply = parseAssistantPayload(raw);
    log.debug('assistant reply', { len: reply.replyText.length, commands: reply.commands.map((c) => c.kind) });
    return reply;
  }
}

export function buildMessages(utterance: string, context: ConversationContext): ChatMessage[] {
  const messages: ChatMessage[] = [
    { role: 'system', content: ASSISTANT_SYSTEM_PROMPT },
    { role: 'system', content: describeContext(context) }
  ];
  for (const turn of context.recentHistory) {
    messages.push(toChatMessage(turn));
  }
  // history normally already ends with the utterance, recorded before assembly
  const lastTurn = context.recentHistory[context.recentHistory.length - 1];
  if (!lastTurn || lastTurn.role !== 'user' || lastTurn.text !== utterance) {
    messages.push({ role: 'user', content: utterance });
  }
  return messages;
}

function toChatMessage(turn: ConversationTurn): ChatMessage {
  if (turn.role === 'system') {
    return { role: 'system', content: `Notice: ${turn.text}` };
  }
  return { role: turn.role, content: turn.text };
}
