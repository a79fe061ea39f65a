import Fastify from 'fastify';
import websocket from '@fastify/websocket';
import { wsHandler } from './adapters/ws-handler';
import { config } from './config';
import { AutoSaveTask } from './core/auto-save';
import type { SessionDeps } from './core/session';
import { LLMClient } from './llm/llm-base';
import { OpenAiAssistantGateway } from './llm/assistant-gateway';
import { OpenAiTextGenerator } from './llm/generator';
import { LlmResearcher } from './llm/researcher';
import { logger } from './observability/logger';
import { InMemoryTreeStore } from './tree/memory-store';
import { loadSnapshot, saveSnapshot } from './tree/snapshot-file';

const server = Fastify({ logger: true });

async function start() {
  logger.info('=== outline-assistant start ===');
  logger.info('editor logger config', {
    DEBUG_EDITOR: process.env.DEBUG_EDITOR ?? '(unset)',
    LOG_LEVEL: process.env.LOG_LEVEL ?? '(unset)'
  });

  const tree = new InMemoryTreeStore();
  const snapshot = await loadSnapshot(config.treeSnapshotFile);
  if (snapshot) {
    tree.restore(snapshot);
    logger.info('tree snapshot loaded', { file: config.treeSnapshotFile, nodes: snapshot.nodes.length });
  }

  // one saver for the one tree, however many clients are connected
  const autoSave = new AutoSaveTask({
    intervalMs: config.autoSaveIntervalMs,
    save: () => saveSnapshot(config.treeSnapshotFile, tree.snapshot())
  });

  const llm = new LLMClient();
  const deps: SessionDeps = {
    tree,
    gateway: new OpenAiAssistantGateway(llm),
    generator: new OpenAiTextGenerator(llm),
    researcher: new LlmResearcher(llm),
    autoSave
  };

  await server.register(websocket);

  server.get('/health', async () => ({ ok: true, nodes: tree.list().length }));

  server.get('/ws/editor', { websocket: true }, (socket, _req) => {
    wsHandler(socket, deps);
  });

  server.addHook('onClose', async () => {
    autoSave.stop();
    await autoSave.flush();
  });

  await server.listen({ port: config.port, host: '0.0.0.0' });
  autoSave.start();
  logger.info('server listening', { port: config.port, host: '0.0.0.0' });
}

start().catch((err) => {
  logger.error('failed to start server', err);
  server.log.error(err, 'failed to start server');
  process.exit(1);
});
