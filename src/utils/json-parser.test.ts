import { test, describe } from 'node:test';
import assert from 'node:assert';
import { z } from 'zod';
import { extractJSON, JSONExtractionError } from './json-parser.js';

const TasksSchema = z.object({
  tasks: z.array(z.object({ id: z.number(), description: z.string() })),
});

describe('JSON Parser', () => {
  test('extracts JSON from markdown code block', () => {
    const output = `Some thinking...
\`\`\`json
{
  "tasks": [
    { "id": 1, "description": "Test" }
  ]
}
\`\`\`
Done!`;

    const result = extractJSON(output, TasksSchema);

    assert.deepStrictEqual(result, { tasks: [{ id: 1, description: 'Test' }] });
  });

  test('extracts JSON from generic code block', () => {
    const output = `\`\`\`
{"name": "test"}
\`\`\``;

    const result = extractJSON(output, z.object({ name: z.string() }));
    assert.strictEqual(result.name, 'test');
  });

  test('extracts bare JSON object', () => {
    const output = `The result is: {"value": 42}`;

    const result = extractJSON(output, z.object({ value: z.number() }));
    assert.strictEqual(result.value, 42);
  });

  test('extracts a bare array', () => {
    const result = extractJSON('ids: [1, 2, 3]', z.array(z.number()));
    assert.deepStrictEqual(result, [1, 2, 3]);
  });

  test('falls through to a later candidate when a code block is not JSON', () => {
    const output = `\`\`\`
see below
\`\`\`
Result: {"value": 42}`;

    const result = extractJSON(output, z.object({ value: z.number() }));
    assert.strictEqual(result.value, 42);
  });

  test('the bare-object candidate spans from the first brace to the last', () => {
    const output = `\`\`\`json
{"draft": true}
\`\`\`
Final: {"tasks": []}`;

    assert.throws(() => extractJSON(output, TasksSchema), JSONExtractionError);
  });

  test('throws JSONExtractionError when no JSON found', () => {
    assert.throws(
      () => extractJSON('No JSON here at all', TasksSchema),
      (err: unknown) =>
        err instanceof JSONExtractionError &&
        err.message === 'No JSON found in output' &&
        err.issues.length === 0
    );
  });

  test('reports schema issues when the shape is wrong', () => {
    assert.throws(
      () => extractJSON('{"other": "value"}', TasksSchema),
      (err: unknown) =>
        err instanceof JSONExtractionError &&
        err.message === 'No JSON in output matched the expected shape' &&
        err.issues.includes('tasks: Required')
    );
  });

  test('keeps a bounded excerpt of the raw output', () => {
    const output = `${'x'.repeat(600)} {"value": "nope"}`;
    assert.throws(
      () => extractJSON(output, z.object({ value: z.number() })),
      (err: unknown) => err instanceof JSONExtractionError && err.rawOutput.length === 500
    );
  });
});
