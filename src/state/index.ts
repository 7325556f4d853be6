import { randomUUID } from 'node:crypto';
import { existsSync, mkdirSync } from 'node:fs';
import { join } from 'node:path';
import { z } from 'zod';
import {
  type EdgeRow,
  type NodeRow,
  getEdgeRows,
  getLatestSessionRow,
  getNodeRows,
  getSessionRow,
  listSessionRows,
  openDatabase,
  replaceGraphRows,
  upsertSession,
} from '../db/index.js';
import { GraphFormatError, TaskGraph } from '../graph/index.js';
import type { EffortLevel, Payload, Session } from '../types/index.js';

export const STATE_DB_FILE = 'state.db';

export interface InitSessionOptions {
  goal: string;
  effort: EffortLevel;
  stateDir: string;
  graph?: TaskGraph;
}

export interface SessionInfo {
  sessionId: string;
  goal: string;
  effort: EffortLevel;
  tick: number;
  createdAt: string;
  updatedAt: string;
}

export function initializeSession(options: InitSessionOptions): Session {
  const now = new Date().toISOString();
  return {
    sessionId: randomUUID(),
    goal: options.goal,
    effort: options.effort,
    tick: 0,
    graph: options.graph ?? new TaskGraph(),
    createdAt: now,
    updatedAt: now,
    stateDir: options.stateDir,
  };
}

function databaseFor(stateDir: string) {
  mkdirSync(stateDir, { recursive: true });
  return openDatabase(join(stateDir, STATE_DB_FILE));
}

function encodePayload(payload: Payload | null): string | null {
  return payload === null ? null : JSON.stringify(payload);
}

const StoredPayloadSchema = z.record(z.unknown()).nullable();

function decodePayload(text: string | null, where: string): Payload | null {
  if (text === null) return null;
  const result = StoredPayloadSchema.safeParse(JSON.parse(text));
  if (!result.success) {
    throw new GraphFormatError(`Stored payload of ${where} is not an object`);
  }
  return result.data;
}

/**
 * Persist the session row and its whole graph in one transaction.
 */
export function saveSession(session: Session): void {
  const db = databaseFor(session.stateDir);
  session.updatedAt = new Date().toISOString();

  const nodes: NodeRow[] = session.graph.nodes.map((node) => ({
    id: node.id,
    description: node.description,
    status: node.status,
    inputs: encodePayload(node.inputs),
    outputs: encodePayload(node.outputs),
  }));
  const edges: EdgeRow[] = session.graph.edges.map((edge) => ({
    source: edge.source,
    target: edge.target,
    dependency_type: edge.dependencyType,
    data_transfer: encodePayload(edge.dataTransfer),
  }));

  const saveTransaction = db.transaction(() => {
    upsertSession(db, {
      id: session.sessionId,
      goal: session.goal,
      effort: session.effort,
      tick: session.tick,
      created_at: session.createdAt,
      updated_at: session.updatedAt,
    });
    replaceGraphRows(db, session.sessionId, nodes, edges);
  });

  saveTransaction();
}

/**
 * Load a session, or the most recently created one when no id is given.
 * Returns null when the state directory holds no such session.
 */
export function loadSession(stateDir: string, sessionId?: string): Session | null {
  if (!existsSync(join(stateDir, STATE_DB_FILE))) {
    return null;
  }

  const db = databaseFor(stateDir);
  const row = sessionId === undefined ? getLatestSessionRow(db) : getSessionRow(db, sessionId);
  if (!row) {
    return null;
  }

  // Rebuilt through the store so a corrupt edge surfaces as NodeReferenceError
  const graph = new TaskGraph();
  for (const node of getNodeRows(db, row.id)) {
    graph.restoreNode({
      id: node.id,
      description: node.description,
      status: node.status,
      inputs: decodePayload(node.inputs, `node ${node.id}`),
      outputs: decodePayload(node.outputs, `node ${node.id}`),
    });
  }
  for (const edge of getEdgeRows(db, row.id)) {
    graph.addEdge(
      edge.source,
      edge.target,
      edge.dependency_type,
      decodePayload(edge.data_transfer, `edge ${edge.source} -> ${edge.target}`)
    );
  }

  return {
    sessionId: row.id,
    goal: row.goal,
    effort: row.effort,
    tick: row.tick,
    graph,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    stateDir,
  };
}

export function listSessions(stateDir: string): SessionInfo[] {
  if (!existsSync(join(stateDir, STATE_DB_FILE))) {
    return [];
  }

  return listSessionRows(databaseFor(stateDir)).map((row) => ({
    sessionId: row.id,
    goal: row.goal,
    effort: row.effort,
    tick: row.tick,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  }));
}
