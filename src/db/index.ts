import Database from 'better-sqlite3';
import { readFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

let db: Database.Database | null = null;

export function createDatabase(dbPath: string): Database.Database {
  closeDatabase();

  db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  // Run schema
  const schema = readFileSync(join(__dirname, 'schema.sql'), 'utf-8');
  db.exec(schema);

  return db;
}

/** The open database if it is the one at `dbPath`, otherwise a freshly opened one. */
export function openDatabase(dbPath: string): Database.Database {
  if (db && db.name === dbPath) {
    return db;
  }
  return createDatabase(dbPath);
}

export function closeDatabase(): void {
  if (db) {
    db.close();
    db = null;
  }
}

// Row shapes as stored; JSON columns stay as text here
export const SessionRowSchema = z.object({
  id: z.string(),
  goal: z.string(),
  effort: z.enum(['low', 'medium', 'high']),
  tick: z.number().int(),
  created_at: z.string(),
  updated_at: z.string(),
});

export const NodeRowSchema = z.object({
  id: z.string(),
  description: z.string(),
  status: z.enum(['pending', 'in_progress', 'completed', 'failed']),
  inputs: z.string().nullable(),
  outputs: z.string().nullable(),
});

export const EdgeRowSchema = z.object({
  source: z.string(),
  target: z.string(),
  dependency_type: z.enum(['hard', 'soft']),
  data_transfer: z.string().nullable(),
});

export type SessionRow = z.infer<typeof SessionRowSchema>;
export type NodeRow = z.infer<typeof NodeRowSchema>;
export type EdgeRow = z.infer<typeof EdgeRowSchema>;

export function upsertSession(database: Database.Database, row: SessionRow): void {
  database
    .prepare(`
    INSERT INTO sessions (id, goal, effort, tick, created_at, updated_at)
    VALUES (@id, @goal, @effort, @tick, @created_at, @updated_at)
    ON CONFLICT(id) DO UPDATE SET
      goal = excluded.goal,
      effort = excluded.effort,
      tick = excluded.tick,
      updated_at = excluded.updated_at
  `)
    .run(row);
}

/**
 * Replace the stored graph of a session. Call inside a transaction together
 * with the session row so readers never see half a graph.
 */
export function replaceGraphRows(
  database: Database.Database,
  sessionId: string,
  nodes: readonly NodeRow[],
  edges: readonly EdgeRow[]
): void {
  database.prepare('DELETE FROM edges WHERE session_id = ?').run(sessionId);
  database.prepare('DELETE FROM nodes WHERE session_id = ?').run(sessionId);

  const insertNode = database.prepare(`
    INSERT INTO nodes (session_id, id, position, description, status, inputs, outputs)
    VALUES (?, ?, ?, ?, ?, ?, ?)
  `);
  nodes.forEach((node, position) => {
    insertNode.run(
      sessionId,
      node.id,
      position,
      node.description,
      node.status,
      node.inputs,
      node.outputs
    );
  });

  const insertEdge = database.prepare(`
    INSERT INTO edges (session_id, position, source, target, dependency_type, data_transfer)
    VALUES (?, ?, ?, ?, ?, ?)
  `);
  edges.forEach((edge, position) => {
    insertEdge.run(
      sessionId,
      position,
      edge.source,
      edge.target,
      edge.dependency_type,
      edge.data_transfer
    );
  });
}

export function getSessionRow(database: Database.Database, sessionId: string): SessionRow | null {
  const row = database.prepare('SELECT * FROM sessions WHERE id = ?').get(sessionId);
  return row === undefined ? null : SessionRowSchema.parse(row);
}

export function getLatestSessionRow(database: Database.Database): SessionRow | null {
  const row = database
    .prepare('SELECT * FROM sessions ORDER BY created_at DESC, rowid DESC LIMIT 1')
    .get();
  return row === undefined ? null : SessionRowSchema.parse(row);
}

export function listSessionRows(database: Database.Database): SessionRow[] {
  const rows = database.prepare('SELECT * FROM sessions ORDER BY created_at, rowid').all();
  return z.array(SessionRowSchema).parse(rows);
}

export function getNodeRows(database: Database.Database, sessionId: string): NodeRow[] {
  const rows = database
    .prepare(`
    SELECT id, description, status, inputs, outputs
    FROM nodes WHERE session_id = ? ORDER BY position
  `)
    .all(sessionId);
  return z.array(NodeRowSchema).parse(rows);
}

export function getEdgeRows(database: Database.Database, sessionId: string): EdgeRow[] {
  const rows = database
    .prepare(`
    SELECT source, target, dependency_type, data_transfer
    FROM edges WHERE session_id = ? ORDER BY position
  `)
    .all(sessionId);
  return z.array(EdgeRowSchema).parse(rows);
}
