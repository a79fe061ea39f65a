import { z } from 'zod';
import type { AssistantReply } from '../core/collaborators';
import { GatewayError } from '../core/errors';
import { CommandKind } from '../commands/types';

export const CommandSchema = z.object({
  kind: z.nativeEnum(CommandKind),
  parameters: z.array(z.string())
});

export const AssistantReplySchema = z.object({
  replyText: z.string(),
  commands: z.array(CommandSchema)
});

// Wire shape the assistant is instructed to answer with.
export const AssistantPayloadSchema = z.object({
  reply: z.string(),
  commands: z.array(CommandSchema).default([])
});

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ');
}

/** Shape check on whatever a gateway returned. Malformed means the whole reply is rejected. */
export function validateAssistantReply(value: unknown): AssistantReply {
  const parsed = AssistantReplySchema.safeParse(value);
  if (!parsed.success) {
    throw new GatewayError(`malformed assistant response: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function parseAssistantPayload(raw: string): AssistantReply {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new GatewayError('assistant response is not valid JSON', err);
  }
  const parsed = AssistantPayloadSchema.safeParse(json);
  if (!parsed.success) {
    throw new GatewayError(`malformed assistant response: ${formatIssues(parsed.error)}`);
  }
  return { replyText: parsed.data.reply, commands: parsed.data.commands };
}
