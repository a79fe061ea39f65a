import type WebSocket from 'ws';
import { EditorSession, type SessionDeps } from '../core/session';
import { logger } from '../observability/logger';
import { ClientMessageSchema } from './protocol';

const log = logger.child('ws');

const nowMs = () => Date.now();

export function wsHandler(socket: WebSocket, deps: SessionDeps) {
  let session: EditorSession | null = null;

  const sendJson = async (payload: Record<string, unknown>) => {
    log.debug('ws->client', payload.type, summarizePayload(payload));
    socket.send(JSON.stringify(payload));
  };

  socket.on('message', async (data: WebSocket.RawData) => {
    try {
      const parsed = ClientMessageSchema.safeParse(JSON.parse(data.toString()));
      if (!parsed.success) {
        await sendJson({ type: 'error', code: 'BAD_MESSAGE', message: parsed.error.issues[0]?.message ?? 'invalid' });
        return;
      }
      const msg = parsed.data;

      if (msg.type === 'ping') {
        await sendJson({ type: 'pong', ts_ms: nowMs() });
        return;
      }

      if (msg.type === 'start') {
        if (session) {
          await sendJson({ type: 'error', code: 'ALREADY_STARTED', message: 'session already started' });
          return;
        }
        const sid = msg.session_id ?? cryptoRandomId();
        log.info('ws start', { sid });
        session = new EditorSession(sid, sendJson, deps);
        await session.start();
        return;
      }

      if (!session) {
        await sendJson({ type: 'error', code: 'NO_SESSION', message: 'send start first' });
        return;
      }

      switch (msg.type) {
        case 'chat':
          await session.chat(msg.text);
          return;
        case 'select':
          await session.select(msg.node_id);
          return;
        case 'tree':
          await session.sendTree();
          return;
        case 'confirm_response':
          if (!session.resolveConfirm(msg.id, msg.accepted)) {
            await sendJson({ type: 'error', code: 'UNKNOWN_CONFIRM', message: `no pending confirmation ${msg.id}` });
          }
          return;
        case 'stop':
          log.info('ws stop', { sid: session.sessionId, reason: msg.reason ?? 'stop' });
          await session.stop(msg.reason ?? 'stop');
          socket.close();
          return;
      }
    } catch (e) {
      log.error('ws handler error', e);
      await sendJson({ type: 'error', code: 'WS_HANDLER_ERROR', message: 'invalid websocket message' });
    }
  });

  socket.on('close', async () => {
    if (session) {
      log.info('ws close', { sid: session.sessionId });
      await session.stop('ws_closed');
    }
  });
}

function cryptoRandomId() {
  return Math.random().toString(36).slice(2) + Date.now().toString(36);
}

function summarizePayload(payload: Record<string, unknown>) {
  if (payload.type === 'tree' && Array.isArray(payload.nodes)) {
    return { ...payload, nodes: `<${payload.nodes.length} nodes>` };
  }
  if (payload.type === 'turn' && typeof payload.text === 'string' && payload.text.length > 80) {
    return { ...payload, text: `${payload.text.slice(0, 80)}...`, text_len: payload.text.length };
  }
  return payload;
}
