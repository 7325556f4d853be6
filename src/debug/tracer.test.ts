import assert from 'node:assert';
import { existsSync, readdirSync, rmSync } from 'node:fs';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { describe, test } from 'node:test';
import { createFileTracer } from './file-tracer.js';
import { createNoopTracer } from './noop-tracer.js';

describe('NoopTracer', () => {
  test('all methods are callable without error', async () => {
    const tracer = createNoopTracer();

    await tracer.init('session-1', 'ship it', 'medium');
    tracer.logTick(1, [{ nodeId: 'a', from: 'pending', to: 'in_progress' }]);
    await tracer.logAgentCall({
      prompt: 'test',
      response: 'test',
      costUsd: 0.01,
      durationMs: 1000,
    });
    tracer.logMcpToolCall('advance', {}, { success: true });
    tracer.logDecision('decomposition', {}, 'empty_graph', 'malformed output');
    tracer.logTaskStatusChange('a', 'pending', 'failed', 'manual');
    tracer.logGraphChange('add_task', { id: 'a' });
    tracer.logError('boom');
    await tracer.finalize();

    assert.ok(true, 'All methods completed without error');
  });
});

describe('FileTracer', () => {
  const testDir = join(process.cwd(), '.taskdag-test-debug');

  test('creates trace file on init', async () => {
    rmSync(testDir, { recursive: true, force: true });

    const tracer = createFileTracer(testDir);
    await tracer.init('session-123', 'write docs', 'high');

    const traceDir = join(testDir, 'debug', 'session-123');
    assert.ok(existsSync(traceDir), 'Debug directory created');
    assert.ok(existsSync(join(traceDir, 'trace.json')), 'Trace file created');

    await tracer.finalize();
    rmSync(testDir, { recursive: true, force: true });
  });

  test('logs ticks and status changes in order', async () => {
    rmSync(testDir, { recursive: true, force: true });

    const tracer = createFileTracer(testDir);
    await tracer.init('session-456', 'write docs', 'medium');

    tracer.logTick(1, [{ nodeId: 'a', from: 'pending', to: 'in_progress' }]);
    tracer.logTaskStatusChange('a', 'in_progress', 'failed', 'manual');

    await tracer.finalize();

    const traceContent = await readFile(
      join(testDir, 'debug', 'session-456', 'trace.json'),
      'utf-8'
    );
    const trace = JSON.parse(traceContent);

    assert.strictEqual(trace.sessionId, 'session-456');
    assert.strictEqual(trace.goal, 'write docs');
    assert.strictEqual(trace.events.length, 2);
    assert.strictEqual(trace.events[0].type, 'tick');
    assert.deepStrictEqual(trace.events[0].transitions, [
      { nodeId: 'a', from: 'pending', to: 'in_progress' },
    ]);
    assert.strictEqual(trace.events[1].type, 'task_status_change');
    assert.strictEqual(trace.events[1].source, 'manual');
    assert.notStrictEqual(trace.completedAt, null);

    rmSync(testDir, { recursive: true, force: true });
  });

  test('writes agent prompts and responses to separate files', async () => {
    rmSync(testDir, { recursive: true, force: true });

    const tracer = createFileTracer(testDir);
    await tracer.init('session-789', 'goal', 'low');

    await tracer.logAgentCall({
      prompt: 'x'.repeat(10000),
      response: 'y'.repeat(10000),
      costUsd: 0.02,
      durationMs: 5000,
    });

    await tracer.finalize();

    const files = readdirSync(join(testDir, 'debug', 'session-789', 'outputs')).sort();
    assert.deepStrictEqual(files, ['decompose-1-prompt.txt', 'decompose-1-response.txt']);

    rmSync(testDir, { recursive: true, force: true });
  });
});
