/**
 * Database layer using LowDB
 *
 * Session records for status polling. Data is kept in a JSON file and
 * survives a server restart; artifacts themselves live in the artifact store.
 */

import { Low, type Adapter } from 'lowdb';
import { JSONFile } from 'lowdb/node';
import path from 'path';
import fs from 'fs';
import type { TranslationSession } from '../engine/types/common.js';
import type { SessionState } from '../engine/types/pipeline.js';
import { createCounters } from '../engine/pipeline/session-tracker.js';

export interface SessionRecord {
  id: string;
  session: TranslationSession;
  filename: string;
  state: SessionState;
  finalArtifactKey?: string;
  reencodedArtifactKey?: string;
  createdAt: string;
  updatedAt: string;
}

export interface DatabaseSchema {
  sessions: SessionRecord[];
}

export const DATABASE_FILE = 'sessions-db.json';

function defaultData(): DatabaseSchema {
  return { sessions: [] };
}

// Database instance
let db: Low<DatabaseSchema> | null = null;

export interface DatabaseOptions {
  dataDir?: string;
  adapter?: Adapter<DatabaseSchema>; // Overrides the JSON file, e.g. lowdb's Memory adapter
}

/**
 * Initialize database
 */
export async function initDatabase(options: DatabaseOptions = {}): Promise<Low<DatabaseSchema>> {
  let adapter = options.adapter;

  if (!adapter) {
    const dataDir = options.dataDir ?? './data';
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true });
    }
    const dbPath = path.join(dataDir, DATABASE_FILE);
    adapter = new JSONFile<DatabaseSchema>(dbPath);
    console.log(`[Database] Using ${dbPath}`);
  }

  db = new Low(adapter, defaultData());
  await db.read();
  db.data ||= defaultData();

  const interrupted = await markInterruptedSessions();
  console.log(`[Database] ${db.data.sessions.length} sessions loaded, ${interrupted} marked interrupted`);

  return db;
}

/**
 * Get database instance
 */
export function getDb(): Low<DatabaseSchema> {
  if (!db) {
    throw new Error('Database not initialized. Call initDatabase() first.');
  }
  return db;
}

/**
 * Initial state of a session that has not started running yet
 */
export function pendingState(sessionId: string): SessionState {
  const now = new Date().toISOString();
  return {
    sessionId,
    stage: 'Initializing',
    lastStage: 'Initializing',
    counters: createCounters(),
    warnings: [],
    fallbackChunks: [],
    startedAt: now,
    updatedAt: now,
  };
}

/**
 * Sessions left running by a previous process can never finish
 */
async function markInterruptedSessions(): Promise<number> {
  const db = getDb();
  let count = 0;

  for (const record of db.data.sessions) {
    if (record.state.stage !== 'Done' && record.state.stage !== 'Failed') {
      const now = new Date().toISOString();
      record.state = {
        ...record.state,
        stage: 'Failed',
        lastError: {
          kind: 'Unknown',
          message: 'Interrupted by server restart',
          stage: record.state.lastStage,
        },
        finishedAt: now,
        updatedAt: now,
      };
      record.updatedAt = now;
      count++;
    }
  }

  if (count > 0) {
    await db.write();
  }
  return count;
}

// ============ Session Operations ============

export async function getAllSessions(): Promise<SessionRecord[]> {
  const db = getDb();
  return [...db.data.sessions].sort((a, b) => b.createdAt.localeCompare(a.createdAt));
}

export async function getSession(id: string): Promise<SessionRecord | undefined> {
  const db = getDb();
  return db.data.sessions.find((s) => s.id === id);
}

export async function createSessionRecord(session: TranslationSession, filename: string): Promise<SessionRecord> {
  const db = getDb();
  const now = new Date().toISOString();

  const record: SessionRecord = {
    id: session.id,
    session,
    filename,
    state: pendingState(session.id),
    createdAt: now,
    updatedAt: now,
  };

  db.data.sessions.push(record);
  await db.write();

  console.log(`[Database] Session created: ${session.id} (${filename})`);
  return record;
}

/**
 * Store a state snapshot. Older snapshots never replace newer ones.
 */
export async function updateSessionState(id: string, state: SessionState): Promise<SessionRecord | undefined> {
  const db = getDb();
  const record = db.data.sessions.find((s) => s.id === id);
  if (!record) return undefined;

  if (state.updatedAt >= record.state.updatedAt) {
    record.state = state;
    record.updatedAt = new Date().toISOString();
    await db.write();
  }
  return record;
}

export async function setSessionArtifacts(
  id: string,
  artifacts: { finalArtifactKey?: string; reencodedArtifactKey?: string }
): Promise<SessionRecord | undefined> {
  const db = getDb();
  const record = db.data.sessions.find((s) => s.id === id);
  if (!record) return undefined;

  record.finalArtifactKey = artifacts.finalArtifactKey;
  record.reencodedArtifactKey = artifacts.reencodedArtifactKey;
  record.updatedAt = new Date().toISOString();
  await db.write();
  return record;
}
