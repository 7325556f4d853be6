import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { Command, InvalidArgumentError } from 'commander';
import { z } from 'zod';
import { EFFORT_LEVELS, isEffortLevel } from './config/effort.js';
import { NodeStatusSchema } from './state/schema.js';
import type { EffortLevel, NodeStatus } from './types/index.js';

export const DEFAULT_STATE_DIR = '.taskdag';

function getVersion(): string {
  const __dirname = dirname(fileURLToPath(import.meta.url));
  const pkgPath = join(__dirname, '..', 'package.json');
  try {
    const pkg = z.object({ version: z.string() }).parse(JSON.parse(readFileSync(pkgPath, 'utf-8')));
    return pkg.version;
  } catch (e) {
    return `unknown (${e instanceof Error ? e.message : String(e)})`;
  }
}

export interface GlobalOptions {
  stateDir: string;
  session?: string;
  debug: boolean;
}

const GlobalOptionsSchema = z.object({
  stateDir: z.string(),
  session: z.string().optional(),
  debug: z.boolean().default(false),
});

/**
 * Command handlers. Each resolves to the process exit code:
 * 0 success, 1 error, 2 when the graph has failed tasks and nothing advanced.
 */
export interface CliActions {
  plan(goal: string, opts: { effort: EffortLevel; maxTasks?: number }, g: GlobalOptions): Promise<number>;
  import(file: string, opts: { records: boolean; goal?: string }, g: GlobalOptions): Promise<number>;
  export(opts: { out?: string }, g: GlobalOptions): Promise<number>;
  addTask(description: string, g: GlobalOptions): Promise<number>;
  addDep(source: string, target: string, opts: { soft: boolean }, g: GlobalOptions): Promise<number>;
  removeDep(source: string, target: string, g: GlobalOptions): Promise<number>;
  removeTask(id: string, g: GlobalOptions): Promise<number>;
  setStatus(id: string, status: NodeStatus, g: GlobalOptions): Promise<number>;
  advance(g: GlobalOptions): Promise<number>;
  run(opts: { maxTicks?: number }, g: GlobalOptions): Promise<number>;
  show(g: GlobalOptions): Promise<number>;
  sessions(g: GlobalOptions): Promise<number>;
  mcp(g: GlobalOptions): Promise<number>;
}

export function parseEffort(value: string): EffortLevel {
  if (!isEffortLevel(value)) {
    throw new InvalidArgumentError(`Expected one of ${EFFORT_LEVELS.join(', ')}.`);
  }
  return value;
}

export function parsePositiveInt(value: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new InvalidArgumentError('Expected a positive integer.');
  }
  return n;
}

export function parseStatus(value: string): NodeStatus {
  const result = NodeStatusSchema.safeParse(value);
  if (!result.success) {
    throw new InvalidArgumentError(`Expected one of ${NodeStatusSchema.options.join(', ')}.`);
  }
  return result.data;
}

const PlanOptionsSchema = z.object({
  effort: z.enum(['low', 'medium', 'high']),
  maxTasks: z.number().int().positive().optional(),
});
const ImportOptionsSchema = z.object({
  records: z.boolean().default(false),
  goal: z.string().optional(),
});
const ExportOptionsSchema = z.object({ out: z.string().optional() });
const AddDepOptionsSchema = z.object({ soft: z.boolean().default(false) });
const RunOptionsSchema = z.object({ maxTicks: z.number().int().positive().optional() });

export function createCLI(
  actions: CliActions,
  setExitCode: (code: number) => void = (code) => {
    process.exitCode = code;
  }
): Command {
  const program = new Command();

  program
    .name('taskdag')
    .version(getVersion(), '-v, --version', 'Show version number')
    .description('Task dependency graphs: plan a goal into tasks and advance them tick by tick')
    .option('--state-dir <path>', 'State directory', DEFAULT_STATE_DIR)
    .option('--session <id>', 'Session to operate on (default: most recent)')
    .option('--debug', `Enable debug tracing to <state-dir>/debug/<sessionId>/`, false);

  // Wraps a handler so its exit code reaches the process
  const run =
    (handler: (g: GlobalOptions, cmd: Command) => Promise<number>) =>
    async (...args: unknown[]) => {
      const cmd = args[args.length - 1];
      if (!(cmd instanceof Command)) {
        throw new Error('commander did not pass the command to its action');
      }
      const g = GlobalOptionsSchema.parse(cmd.optsWithGlobals());
      setExitCode(await handler(g, cmd));
    };

  program
    .command('plan')
    .description('Decompose a goal into tasks with the agent and start a session')
    .argument('<goal>', 'Goal to plan')
    .option('--effort <level>', 'Effort level: low|medium|high', parseEffort, 'medium')
    .option('--max-tasks <n>', 'Upper bound on tasks (default from effort)', parsePositiveInt)
    .action(
      run((g, cmd) => actions.plan(cmd.args[0], PlanOptionsSchema.parse(cmd.opts()), g))
    );

  program
    .command('import')
    .description('Start a session from a graph JSON file')
    .argument('<file>', 'JSON file to read')
    .option('--records', 'File holds decomposition records ({"tasks": [...]})', false)
    .option('--goal <text>', 'Goal to record for the session (default: file name)')
    .action(
      run((g, cmd) => actions.import(cmd.args[0], ImportOptionsSchema.parse(cmd.opts()), g))
    );

  program
    .command('export')
    .description('Write the session graph as JSON')
    .option('--out <file>', 'Write to a file instead of stdout')
    .action(run((g, cmd) => actions.export(ExportOptionsSchema.parse(cmd.opts()), g)));

  program
    .command('add-task')
    .description('Add a pending task')
    .argument('<description>', 'What the task does')
    .action(run((g, cmd) => actions.addTask(cmd.args[0], g)));

  program
    .command('add-dep')
    .description('Make <target> wait until <source> is completed')
    .argument('<source>', 'Prerequisite task ID')
    .argument('<target>', 'Dependent task ID')
    .option('--soft', 'Informational dependency that does not gate advancement', false)
    .action(
      run((g, cmd) =>
        actions.addDep(
          cmd.args[0],
          cmd.args[1],
          AddDepOptionsSchema.parse(cmd.opts()),
          g
        )
      )
    );

  program
    .command('remove-dep')
    .description('Remove every dependency from <source> to <target>')
    .argument('<source>', 'Prerequisite task ID')
    .argument('<target>', 'Dependent task ID')
    .action(run((g, cmd) => actions.removeDep(cmd.args[0], cmd.args[1], g)));

  program
    .command('remove-task')
    .description('Remove a task and its dependencies')
    .argument('<id>', 'Task ID')
    .action(run((g, cmd) => actions.removeTask(cmd.args[0], g)));

  program
    .command('set-status')
    .description('Override the status of a task')
    .argument('<id>', 'Task ID')
    .argument('<status>', 'pending|in_progress|completed|failed', parseStatus)
    .action(
      run((g, cmd) =>
        actions.setStatus(cmd.args[0], NodeStatusSchema.parse(cmd.args[1]), g)
      )
    );

  program
    .command('advance')
    .description('Run one advancement tick')
    .action(run((g) => actions.advance(g)));

  program
    .command('run')
    .description('Advance until nothing changes')
    .option('--max-ticks <n>', 'Stop after this many ticks (default from effort)', parsePositiveInt)
    .action(run((g, cmd) => actions.run(RunOptionsSchema.parse(cmd.opts()), g)));

  program
    .command('show')
    .description('Summarize the session graph')
    .action(run((g) => actions.show(g)));

  program
    .command('sessions')
    .description('List saved sessions')
    .action(run((g) => actions.sessions(g)));

  program
    .command('mcp')
    .description('Serve the session graph over MCP on stdio')
    .action(run((g) => actions.mcp(g)));

  return program;
}
