import test from 'node:test';
import assert from 'node:assert/strict';
import { CommandKind, type Command, type CommandOutcome } from '../src/commands/types';
import type { AssistantReply } from '../src/core/collaborators';
import { ProcessingState } from '../src/core/fsm';
import { ConversationOrchestrator, type SubmitResult } from '../src/orchestrator/orchestrator';
import { CurrentNodeRef } from '../src/tree/selection';
import { FakeConfirmation, FakeGenerator, FakeResearcher, ScriptedGateway, sequentialStore } from './helpers/fakes';

function setup(opts: { maxMessageLength?: number } = {}) {
  const tree = sequentialStore();
  const selection = new CurrentNodeRef();
  const gateway = new ScriptedGateway();
  const researcher = new FakeResearcher();
  const orchestrator = new ConversationOrchestrator(
    {
      tree,
      selection,
      gateway,
      generator: new FakeGenerator(),
      researcher,
      confirmation: new FakeConfirmation()
    },
    { maxMessageLength: opts.maxMessageLength ?? 4000, historyCapacity: 100, researchFollowUpDepth: 1 }
  );
  const states: ProcessingState[] = [];
  const outcomes: Array<{ command: Command; outcome: CommandOutcome }> = [];
  orchestrator.onProcessingStateChanged((s) => states.push(s));
  orchestrator.onCommandOutcome((e) => outcomes.push(e));
  return { tree, selection, gateway, researcher, orchestrator, states, outcomes };
}

const settle = () => new Promise<void>((resolve) => setImmediate(resolve));

const roles = (o: ConversationOrchestrator) => o.history.map((t) => `${t.role}:${t.text}`);

test('create-a-chapter scenario records both turns, creates the node and remembers the command', async () => {
  const { tree, selection, gateway, orchestrator, states } = setup();
  const create: Command = { kind: CommandKind.CreateNode, parameters: ['Intro'] };
  gateway.push({ replyText: 'Done', commands: [create] });

  const result = await orchestrator.submit('Create a chapter called Intro');

  assert.equal(result, 'accepted');
  assert.deepEqual(roles(orchestrator), ['user:Create a chapter called Intro', 'assistant:Done']);
  assert.deepEqual(
    tree.list().map((n) => n.title),
    ['Intro']
  );
  assert.equal(selection.get(), 'n1');
  assert.deepEqual(orchestrator.lastCommand, create);
  assert.equal(orchestrator.state, ProcessingState.IDLE);
  assert.deepEqual(states, [ProcessingState.PROCESSING, ProcessingState.IDLE]);
});

test('gateway receives the utterance and the assembled context', async () => {
  const { tree, selection, gateway, orchestrator } = setup();
  const node = await tree.createNode(undefined, 'Notes');
  selection.set(node.id);
  gateway.push({ replyText: 'ok', commands: [] });

  await orchestrator.submit('  summarize this  ');

  assert.equal(gateway.calls.length, 1);
  const { utterance, context } = gateway.calls[0];
  assert.equal(utterance, 'summarize this');
  assert.equal(context.currentNodeId, 'n1');
  assert.equal(context.currentNodeSummary, 'Title: Notes');
  assert.deepEqual(
    context.recentHistory.map((t) => t.text),
    ['summarize this']
  );
});

test('an oversize message records one system turn and never reaches the gateway', async () => {
  const { gateway, orchestrator, states } = setup({ maxMessageLength: 4000 });

  const result = await orchestrator.submit('x'.repeat(4001));

  assert.equal(result, 'too_long');
  assert.deepEqual(roles(orchestrator), ['system:message too long: 4001 characters exceeds the 4000 limit']);
  assert.equal(gateway.calls.length, 0);
  assert.equal(orchestrator.state, ProcessingState.IDLE);
  assert.deepEqual(states, []);
});

test('empty or whitespace submissions are silent no-ops', async () => {
  const { gateway, orchestrator, states } = setup();
  assert.equal(await orchestrator.submit(''), 'empty');
  assert.equal(await orchestrator.submit('  \n\t '), 'empty');
  assert.equal(orchestrator.history.length, 0);
  assert.equal(gateway.calls.length, 0);
  assert.deepEqual(states, []);
});

test('a submission while processing changes neither the ledger nor the state', async () => {
  const { gateway, orchestrator } = setup();
  let release: (reply: AssistantReply) => void = () => {};
  gateway.push(
    () =>
      new Promise<AssistantReply>((resolve) => {
        release = resolve;
      })
  );

  const first = orchestrator.submit('first');
  assert.equal(orchestrator.state, ProcessingState.PROCESSING);
  const lengthBefore = orchestrator.history.length;

  assert.equal(await orchestrator.submit('second'), 'busy');
  assert.equal(orchestrator.history.length, lengthBefore);
  assert.equal(orchestrator.state, ProcessingState.PROCESSING);

  await settle();
  release({ replyText: 'done', commands: [] });
  assert.equal(await first, 'accepted');
  assert.deepEqual(roles(orchestrator), ['user:first', 'assistant:done']);
  assert.equal(gateway.calls.length, 1);
});

test('a gateway failure appends exactly one system turn and returns to idle', async () => {
  const { gateway, orchestrator, states } = setup();
  gateway.push(new Error('connection reset'));

  const result = await orchestrator.submit('hello');

  assert.equal(result, 'accepted');
  assert.deepEqual(roles(orchestrator), ['user:hello', 'system:Assistant request failed: connection reset']);
  assert.equal(orchestrator.history.filter((t) => t.role === 'assistant').length, 0);
  assert.equal(orchestrator.state, ProcessingState.IDLE);
  assert.deepEqual(states, [ProcessingState.PROCESSING, ProcessingState.IDLE]);
});

test('a malformed gateway response is one gateway failure, not a partial success', async () => {
  const { tree, gateway, orchestrator } = setup();
  gateway.push(JSON.parse('{"replyText": "ok", "commands": [{"kind": "CreateNode", "parameters": ["A"]}, {"kind": "Explode"}]}'));

  await orchestrator.submit('go');

  const history = orchestrator.history;
  assert.equal(history.length, 2);
  assert.equal(history[1].role, 'system');
  assert.match(history[1].text, /^Assistant request failed: malformed assistant response/);
  assert.equal(tree.list().length, 0);
  assert.equal(orchestrator.lastCommand, undefined);
});

test('a failing command in the middle of a batch does not stop the rest', async () => {
  const { tree, gateway, orchestrator, outcomes } = setup();
  const batch: Command[] = [
    { kind: CommandKind.CreateNode, parameters: ['One'] },
    { kind: CommandKind.UpdateNode, parameters: [] },
    { kind: CommandKind.CreateNode, parameters: ['Two'] }
  ];
  gateway.push({ replyText: 'working on it', commands: batch });

  await orchestrator.submit('build it');

  assert.deepEqual(
    outcomes.map((o) => [o.command.kind, o.outcome.ok]),
    [
      [CommandKind.CreateNode, true],
      [CommandKind.UpdateNode, false],
      [CommandKind.CreateNode, true]
    ]
  );
  assert.deepEqual(
    tree.list().map((n) => [n.title, n.parentId]),
    [
      ['One', null],
      ['Two', 'n1']
    ]
  );
  assert.deepEqual(roles(orchestrator), [
    'user:build it',
    'assistant:working on it',
    'system:UpdateNode failed (validation): missing parameter: content'
  ]);
  assert.deepEqual(orchestrator.lastCommand, batch[2]);
});

test('update without a selection surfaces a precondition failure and mutates nothing', async () => {
  const { tree, gateway, orchestrator } = setup();
  await tree.createNode(undefined, 'Loose');
  gateway.push({ replyText: 'updating', commands: [{ kind: CommandKind.UpdateNode, parameters: ['text'] }] });

  await orchestrator.submit('fill it in');

  assert.equal((await tree.getNode('n1'))?.content, '');
  assert.equal(
    orchestrator.history[2].text,
    'UpdateNode failed (precondition): precondition not met: no node is selected'
  );
});

test('an empty command batch keeps the previous last command', async () => {
  const { gateway, orchestrator } = setup();
  const create: Command = { kind: CommandKind.CreateNode, parameters: ['A'] };
  gateway.push({ replyText: 'made it', commands: [create] }, { replyText: 'just chatting', commands: [] });

  await orchestrator.submit('make A');
  await orchestrator.submit('thanks');

  assert.deepEqual(orchestrator.lastCommand, create);
  assert.deepEqual(gateway.calls[1].context.lastCommand, create);
});

test('research feeds its findings back as a separate follow-up turn once idle', async () => {
  const { gateway, researcher, orchestrator, states } = setup();
  let stateDuringFollowUp: ProcessingState | undefined;
  gateway.push(
    { replyText: 'Let me look that up', commands: [{ kind: CommandKind.Research, parameters: ['comets'] }] },
    async () => {
      stateDuringFollowUp = orchestrator.state;
      return { replyText: 'Comets are icy bodies', commands: [] };
    }
  );

  const result = await orchestrator.submit('tell me about comets');

  assert.equal(result, 'accepted');
  assert.deepEqual(researcher.queries, ['comets']);
  assert.deepEqual(roles(orchestrator), [
    'user:tell me about comets',
    'assistant:Let me look that up',
    'user:Research results for "comets":\nnotes on comets',
    'assistant:Comets are icy bodies'
  ]);
  assert.equal(gateway.calls[1].utterance, 'Research results for "comets":\nnotes on comets');
  assert.equal(stateDuringFollowUp, ProcessingState.PROCESSING);
  assert.deepEqual(states, [
    ProcessingState.PROCESSING,
    ProcessingState.IDLE,
    ProcessingState.PROCESSING,
    ProcessingState.IDLE
  ]);
});

test('research inside a follow-up turn does not trigger another follow-up', async () => {
  const { gateway, researcher, orchestrator } = setup();
  const research = (q: string): AssistantReply => ({
    replyText: `researching ${q}`,
    commands: [{ kind: CommandKind.Research, parameters: [q] }]
  });
  gateway.push(research('a'), research('b'));

  await orchestrator.submit('start');

  assert.deepEqual(researcher.queries, ['a', 'b']);
  assert.equal(gateway.calls.length, 2);
  assert.equal(orchestrator.state, ProcessingState.IDLE);
});

test('turnAppended fires for every recorded turn in order', async () => {
  const { gateway, orchestrator } = setup();
  const seen: string[] = [];
  const off = orchestrator.onTurnAppended((turn) => seen.push(turn.role));
  gateway.push(new Error('down'));

  await orchestrator.submit('hi');
  off();
  await orchestrator.submit('');

  assert.deepEqual(seen, ['user', 'system']);
});

test('a submission from an idle listener cannot take the turn owed to research results', async () => {
  const { gateway, orchestrator } = setup();
  gateway.push(
    { replyText: 'looking', commands: [{ kind: CommandKind.Research, parameters: ['comets'] }] },
    { replyText: 'Comets are icy bodies', commands: [] }
  );
  const queued: Array<Promise<SubmitResult>> = [];
  const off = orchestrator.onProcessingStateChanged((state) => {
    if (state === ProcessingState.IDLE && queued.length === 0) {
      queued.push(orchestrator.submit('queued message'));
    }
  });

  await orchestrator.submit('tell me about comets');
  off();

  assert.deepEqual(await Promise.all(queued), ['busy']);
  assert.deepEqual(
    gateway.calls.map((c) => c.utterance),
    ['tell me about comets', 'Research results for "comets":\nnotes on comets']
  );
  assert.deepEqual(roles(orchestrator), [
    'user:tell me about comets',
    'assistant:looking',
    'user:Research results for "comets":\nnotes on comets',
    'assistant:Comets are icy bodies'
  ]);
  assert.equal(orchestrator.state, ProcessingState.IDLE);
});

test('a fault outside the gateway is recorded as one system turn and the state returns to idle', async () => {
  const gateway = new ScriptedGateway();
  const orchestrator = new ConversationOrchestrator({
    tree: sequentialStore(),
    selection: {
      get() {
        throw new Error('selection unavailable');
      },
      set() {},
      clear() {}
    },
    gateway,
    generator: new FakeGenerator(),
    researcher: new FakeResearcher(),
    confirmation: new FakeConfirmation()
  });
  const states: ProcessingState[] = [];
  orchestrator.onProcessingStateChanged((s) => states.push(s));

  const result = await orchestrator.submit('hi');

  assert.equal(result, 'accepted');
  assert.deepEqual(roles(orchestrator), ['user:hi', 'system:Turn failed: selection unavailable']);
  assert.equal(gateway.calls.length, 0);
  assert.equal(orchestrator.state, ProcessingState.IDLE);
  assert.deepEqual(states, [ProcessingState.PROCESSING, ProcessingState.IDLE]);
});
