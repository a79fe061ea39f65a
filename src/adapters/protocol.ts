import { z } from 'zod';

export const ClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('start'), session_id: z.string().min(1).optional() }),
  z.object({ type: z.literal('chat'), text: z.string() }),
  z.object({ type: z.literal('select'), node_id: z.string().min(1).nullable() }),
  z.object({ type: z.literal('tree') }),
  z.object({ type: z.literal('confirm_response'), id: z.string().min(1), accepted: z.boolean() }),
  z.object({ type: z.literal('stop'), reason: z.string().optional() }),
  z.object({ type: z.literal('ping') })
]);
