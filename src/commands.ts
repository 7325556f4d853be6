import { readFile, writeFile } from 'node:fs/promises';
import { basename, resolve } from 'node:path';
import type { CliActions, GlobalOptions } from './cli.js';
import { getEffortConfig } from './config/effort.js';
import { type DebugTracer, createTracer } from './debug/index.js';
import { type GoalDecomposer, buildGraphFromRecords, decomposeGoal } from './decompose/index.js';
import { GraphFormatError, type TaskGraph, findCycle, fromDict, toDict } from './graph/index.js';
import { startMCPServer } from './mcp/index.js';
import {
  addDependency,
  addTask,
  advanceSession,
  getExitCode,
  removeDependency,
  removeTask,
  runUntilSettled,
  setTaskStatus,
} from './orchestrator/index.js';
import { formatGraphSummary } from './orchestrator/summary.js';
import { initializeSession, listSessions, loadSession, saveSession } from './state/index.js';
import { DecompositionSchema } from './state/schema.js';
import type { NodeTransition, Session } from './types/index.js';

export interface CommandDeps {
  decomposer?: GoalDecomposer;
  cwd?: string;
  // Command output; status notes go to stderr so stdout stays parseable
  log?: (line: string) => void;
  warn?: (line: string) => void;
}

function describeCycle(cycle: string[]): string {
  return `Warning: dependency cycle ${cycle.join(' -> ')}; advancing will fail until an edge on it is removed`;
}

function formatTransition(t: NodeTransition): string {
  return `  ${t.nodeId}: ${t.from} -> ${t.to}`;
}

export function createActions(deps: CommandDeps = {}): CliActions {
  const log = deps.log ?? ((line: string) => console.log(line));
  const warn = deps.warn ?? ((line: string) => console.error(line));
  const cwd = deps.cwd ?? process.cwd();

  async function startTracer(g: GlobalOptions, session: Session): Promise<DebugTracer> {
    const tracer = createTracer(g.debug, session.stateDir);
    if (g.debug) {
      await tracer.init(session.sessionId, session.goal, session.effort);
      warn(`Debug tracing enabled: ${session.stateDir}/debug/${session.sessionId}/`);
    }
    return tracer;
  }

  /**
   * Run `body` against a session and persist it afterwards when `mutates`.
   * Errors are reported and turned into exit code 1; the session is not saved.
   */
  async function withSession(
    g: GlobalOptions,
    mutates: boolean,
    body: (session: Session, tracer: DebugTracer) => Promise<number> | number
  ): Promise<number> {
    const stateDir = resolve(cwd, g.stateDir);
    const session = loadSession(stateDir, g.session);
    if (!session) {
      warn(
        g.session
          ? `Error: session ${g.session} not found in ${stateDir}`
          : `Error: no session in ${stateDir}. Run "taskdag plan" or "taskdag import" first.`
      );
      return 1;
    }

    const tracer = await startTracer(g, session);
    try {
      const code = await body(session, tracer);
      if (mutates) {
        saveSession(session);
      }
      return code;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      tracer.logError(message);
      warn(`Error: ${message}`);
      return 1;
    } finally {
      await tracer.finalize();
    }
  }

  /**
   * Build the graph of a new session, save it and report it. `build` returns
   * the graph and the exit code to finish with.
   */
  async function startSession(
    g: GlobalOptions,
    session: Session,
    build: (tracer: DebugTracer) => Promise<{ graph: TaskGraph; exitCode: number }>
  ): Promise<number> {
    const tracer = await startTracer(g, session);
    try {
      const { graph, exitCode } = await build(tracer);
      session.graph = graph;
      saveSession(session);
      reportNewSession(session);
      return exitCode;
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      tracer.logError(message);
      warn(`Error: ${message}`);
      return 1;
    } finally {
      await tracer.finalize();
    }
  }

  function reportNewSession(session: Session): void {
    log(
      `Session ${session.sessionId}: ${session.graph.size} tasks, ${session.graph.edges.length} dependencies`
    );
    const cycle = findCycle(session.graph);
    if (cycle) {
      warn(describeCycle(cycle));
    }
  }

  return {
    plan(goal, opts, g) {
      const session = initializeSession({
        goal,
        effort: opts.effort,
        stateDir: resolve(cwd, g.stateDir),
      });

      return startSession(g, session, async (tracer) => {
        const result = await decomposeGoal(goal, {
          effort: opts.effort,
          cwd,
          maxTasks: opts.maxTasks,
          decomposer: deps.decomposer,
          tracer,
        });
        warn(`Decomposition cost: $${result.costUsd.toFixed(4)}`);
        // A malformed plan still leaves an empty session to add tasks to by hand
        return { graph: result.graph, exitCode: result.error === null ? 0 : 1 };
      });
    },

    import(file, opts, g) {
      const session = initializeSession({
        goal: opts.goal ?? basename(file),
        effort: 'medium',
        stateDir: resolve(cwd, g.stateDir),
      });

      return startSession(g, session, async (tracer) => {
        const data: unknown = JSON.parse(await readFile(resolve(cwd, file), 'utf-8'));
        let graph: TaskGraph;
        if (opts.records) {
          const parsed = DecompositionSchema.safeParse(data);
          if (!parsed.success) {
            throw new GraphFormatError(
              'Invalid decomposition records',
              parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
            );
          }
          graph = buildGraphFromRecords(parsed.data.tasks);
        } else {
          graph = fromDict(data);
        }
        tracer.logGraphChange('import', { file, nodes: graph.size, edges: graph.edges.length });
        return { graph, exitCode: 0 };
      });
    },

    export(opts, g) {
      return withSession(g, false, async (session) => {
        const json = JSON.stringify(toDict(session.graph), null, 2);
        if (opts.out) {
          await writeFile(resolve(cwd, opts.out), `${json}\n`);
          warn(`Wrote ${session.graph.size} tasks to ${opts.out}`);
        } else {
          log(json);
        }
        return 0;
      });
    },

    addTask(description, g) {
      return withSession(g, true, (session, tracer) => {
        log(addTask(session, description, tracer));
        return 0;
      });
    },

    addDep(source, target, opts, g) {
      return withSession(g, true, (session, tracer) => {
        const type = opts.soft ? 'soft' : 'hard';
        const cycle = addDependency(session, source, target, type, tracer);
        log(`Added ${type} dependency ${source} -> ${target}`);
        if (cycle) {
          warn(describeCycle(cycle));
        }
        return 0;
      });
    },

    removeDep(source, target, g) {
      return withSession(g, true, (session, tracer) => {
        const removed = removeDependency(session, source, target, tracer);
        log(`Removed ${removed} dependencies from ${source} to ${target}`);
        return 0;
      });
    },

    removeTask(id, g) {
      return withSession(g, true, (session, tracer) => {
        removeTask(session, id, tracer);
        log(`Removed task ${id}`);
        return 0;
      });
    },

    setStatus(id, status, g) {
      return withSession(g, true, (session, tracer) => {
        const { from } = setTaskStatus(session, id, status, tracer);
        log(`${id}: ${from} -> ${status}`);
        return 0;
      });
    },

    advance(g) {
      return withSession(g, true, (session, tracer) => {
        const transitions = advanceSession(session, { tracer });
        if (transitions.length === 0) {
          log(`Tick ${session.tick}: nothing to advance`);
          return getExitCode(session.graph);
        }
        log(`Tick ${session.tick}:`);
        for (const t of transitions) log(formatTransition(t));
        return 0;
      });
    },

    run(opts, g) {
      return withSession(g, true, (session, tracer) => {
        const maxTicks = opts.maxTicks ?? getEffortConfig(session.effort).maxTicks;
        const result = runUntilSettled(session, {
          maxTicks,
          tracer,
          onTick: (tick, transitions) => {
            if (transitions.length === 0) return;
            log(`Tick ${tick}:`);
            for (const t of transitions) log(formatTransition(t));
          },
        });

        if (!result.settled) {
          warn(`Stopped after ${result.ticks} ticks without settling`);
          return 1;
        }
        log(`Settled after ${result.ticks} ticks`);
        return getExitCode(session.graph);
      });
    },

    show(g) {
      return withSession(g, false, (session) => {
        log(formatGraphSummary(session));
        return 0;
      });
    },

    async sessions(g) {
      const stateDir = resolve(cwd, g.stateDir);
      const sessions = listSessions(stateDir);
      if (sessions.length === 0) {
        log(`No sessions in ${stateDir}`);
        return 0;
      }
      for (const s of sessions) {
        log(`${s.sessionId}  ${s.createdAt}  tick ${s.tick}  ${s.effort}  ${s.goal}`);
      }
      return 0;
    },

    mcp(g) {
      // stdout carries the protocol, so nothing is logged there
      return withSession(g, false, async (session, tracer) => {
        await startMCPServer(session.stateDir, session.sessionId, tracer);
        warn(`Serving session ${session.sessionId} over MCP stdio`);
        return 0;
      });
    },
  };
}
