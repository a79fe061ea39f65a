import { CollaboratorError, PreconditionError, UnsupportedError, ValidationError, describeError } from '../core/errors';
import type { CommandEnv, CommandHandlers } from './registry';
import { CommandKind } from './types';

function requireParam(params: readonly string[], index: number, name: string, allowBlank = false): string {
  const value = params[index];
  if (value === undefined || (!allowBlank && value.trim().length === 0)) {
    throw new ValidationError(`missing parameter: ${name}`);
  }
  return value;
}

function requireSelection(env: CommandEnv): string {
  const id = env.selection.get();
  if (!id) throw new PreconditionError('precondition not met: no node is selected');
  return id;
}

async function collaborate<T>(what: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (err) {
    throw new CollaboratorError(`${what} failed: ${describeError(err)}`, err);
  }
}

export const handlers: CommandHandlers = {
  async [CommandKind.CreateNode](params, env) {
    const title = requireParam(params, 0, 'title').trim();
    const parentId = env.selection.get();
    const node = await collaborate('create node', () => env.tree.createNode(parentId, title));
    env.selection.set(node.id);
    return { ok: true, detail: `Created node "${node.title}"` };
  },

  async [CommandKind.UpdateNode](params, env) {
    const content = requireParam(params, 0, 'content', true);
    const id = requireSelection(env);
    await collaborate('update node', () => env.tree.updateNode(id, content));
    return { ok: true, detail: `Updated node ${id}` };
  },

  async [CommandKind.DeleteNode](_params, env) {
    const id = requireSelection(env);
    const node = await collaborate('load node', () => env.tree.getNode(id));
    if (!node) throw new CollaboratorError(`node ${id} no longer exists`);

    const confirmed = await collaborate('confirmation', () =>
      env.confirmation.confirm('Delete node', `Delete "${node.title}" and everything below it?`)
    );
    if (!confirmed) {
      return { ok: false, error: 'cancelled', message: `Deletion of "${node.title}" was cancelled` };
    }

    const deleted = await collaborate('delete node', () => env.tree.deleteNode(id));
    if (!deleted) throw new CollaboratorError(`node ${id} could not be deleted`);
    // the selection may have moved while the confirmation was open
    const current = env.selection.get();
    if (current === id || (current && !(await collaborate('load node', () => env.tree.getNode(current))))) {
      env.selection.clear();
    }
    return { ok: true, detail: `Deleted node "${node.title}"` };
  },

  async [CommandKind.GenerateContent](params, env) {
    const type = requireParam(params, 0, 'type').trim().toLowerCase();
    const prompt = requireParam(params, 1, 'prompt');

    switch (type) {
      case 'text': {
        const id = requireSelection(env);
        const text = await collaborate('text generation', () => env.generator.generateText(prompt, env.generation));
        await collaborate('update node', () => env.tree.updateNode(id, text));
        return { ok: true, detail: `Generated ${text.length} characters for node ${id}` };
      }
      case 'image':
        throw new UnsupportedError('Image generation is not supported yet');
      default:
        throw new ValidationError(`unknown content type: ${params[0]}`);
    }
  },

  async [CommandKind.Research](params, env) {
    const query = requireParam(params, 0, 'query').trim();
    const results = await collaborate('research', () => env.researcher.research(query));
    return {
      ok: true,
      detail: `Researched "${query}"`,
      followUp: `Research results for "${results.query}":\n${results.summary}`
    };
  }
};
