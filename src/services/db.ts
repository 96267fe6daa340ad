import Database from 'better-sqlite3';
import path from 'node:path';
import fs from 'node:fs';
import type { SessionStatus } from '../types/session.js';

function resolveDbPath(): string {
  const configured = process.env.RELAYDESK_DB_PATH;
  if (configured === ':memory:') return configured;
  return path.resolve(configured ?? 'memory/relaydesk.db');
}

const DB_PATH = resolveDbPath();

if (DB_PATH !== ':memory:' && !fs.existsSync(path.dirname(DB_PATH))) {
  fs.mkdirSync(path.dirname(DB_PATH), { recursive: true });
}

export const db = new Database(DB_PATH);

db.pragma('journal_mode = WAL');
db.pragma('foreign_keys = ON');

db.exec(`
  CREATE TABLE IF NOT EXISTS sessions (
    name TEXT PRIMARY KEY,
    api_id INTEGER NOT NULL,
    api_hash TEXT NOT NULL,
    phone TEXT NOT NULL,
    session_string TEXT,
    status TEXT NOT NULL,
    auto_respond_template TEXT,
    created_at DATETIME DEFAULT CURRENT_TIMESTAMP,
    updated_at DATETIME DEFAULT CURRENT_TIMESTAMP
  );

  CREATE TABLE IF NOT EXISTS profiles (
    name TEXT PRIMARY KEY,
    data_json TEXT NOT NULL,
    created_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS job_history (
    id TEXT PRIMARY KEY,
    kind TEXT NOT NULL,
    label TEXT NOT NULL,
    session_name TEXT,
    state TEXT NOT NULL,
    progress_completed INTEGER NOT NULL DEFAULT 0,
    progress_total INTEGER,
    result_json TEXT,
    error_kind TEXT,
    error_message TEXT,
    created_at TEXT NOT NULL,
    started_at TEXT,
    ended_at TEXT
  );

  CREATE INDEX IF NOT EXISTS idx_job_history_ended_at ON job_history(ended_at);
  CREATE INDEX IF NOT EXISTS idx_job_history_session ON job_history(session_name);
`);

// ── Sessions ────────────────────────────────────────────────────────────────

export interface SessionRow {
  name: string;
  api_id: number;
  api_hash: string;
  phone: string;
  session_string: string | null;
  status: SessionStatus;
  auto_respond_template: string | null;
  updated_at: string;
}

export interface SessionRecordInput {
  name: string;
  apiId: number;
  apiHash: string;
  phone: string;
  sessionString: string | null;
  status: SessionStatus;
}

export function upsertSessionRecord(input: SessionRecordInput): void {
  db.prepare(`
    INSERT INTO sessions (name, api_id, api_hash, phone, session_string, status)
    VALUES (?, ?, ?, ?, ?, ?)
    ON CONFLICT(name) DO UPDATE SET
      api_id = excluded.api_id,
      api_hash = excluded.api_hash,
      phone = excluded.phone,
      session_string = COALESCE(excluded.session_string, sessions.session_string),
      status = excluded.status,
      updated_at = CURRENT_TIMESTAMP
  `).run(input.name, input.apiId, input.apiHash, input.phone, input.sessionString, input.status);
}

export function updateSessionState(name: string, status: SessionStatus, sessionString?: string | null): void {
  if (sessionString === undefined) {
    db.prepare('UPDATE sessions SET status = ?, updated_at = CURRENT_TIMESTAMP WHERE name = ?').run(status, name);
    return;
  }
  db.prepare(
    'UPDATE sessions SET status = ?, session_string = ?, updated_at = CURRENT_TIMESTAMP WHERE name = ?',
  ).run(status, sessionString, name);
}

export function setSessionAutoRespond(name: string, template: string | null): void {
  db.prepare(
    'UPDATE sessions SET auto_respond_template = ?, updated_at = CURRENT_TIMESTAMP WHERE name = ?',
  ).run(template, name);
}

export function getSessionRecord(name: string): SessionRow | undefined {
  return db.prepare<[string], SessionRow>('SELECT * FROM sessions WHERE name = ?').get(name);
}

export function listSessionRecords(): SessionRow[] {
  return db.prepare<[], SessionRow>('SELECT * FROM sessions ORDER BY name ASC').all();
}

export function deleteSessionRecord(name: string): boolean {
  return db.prepare('DELETE FROM sessions WHERE name = ?').run(name).changes > 0;
}

// ── Profiles ────────────────────────────────────────────────────────────────

export interface ProfileRow {
  name: string;
  data_json: string;
  created_at: string;
  updated_at: string;
}

export function insertProfileRow(name: string, dataJson: string, timestamp: string): boolean {
  const result = db.prepare(
    'INSERT OR IGNORE INTO profiles (name, data_json, created_at, updated_at) VALUES (?, ?, ?, ?)',
  ).run(name, dataJson, timestamp, timestamp);
  return result.changes > 0;
}

export function updateProfileRow(name: string, dataJson: string, timestamp: string): boolean {
  const result = db.prepare('UPDATE profiles SET data_json = ?, updated_at = ? WHERE name = ?')
    .run(dataJson, timestamp, name);
  return result.changes > 0;
}

export function deleteProfileRow(name: string): boolean {
  return db.prepare('DELETE FROM profiles WHERE name = ?').run(name).changes > 0;
}

export function getProfileRow(name: string): ProfileRow | undefined {
  return db.prepare<[string], ProfileRow>('SELECT * FROM profiles WHERE name = ?').get(name);
}

export function listProfileRows(): ProfileRow[] {
  return db.prepare<[], ProfileRow>('SELECT * FROM profiles ORDER BY name ASC').all();
}

// ── Job History ─────────────────────────────────────────────────────────────

export interface JobHistoryRow {
  id: string;
  kind: string;
  label: string;
  session_name: string | null;
  state: string;
  progress_completed: number;
  progress_total: number | null;
  result_json: string | null;
  error_kind: string | null;
  error_message: string | null;
  created_at: string;
  started_at: string | null;
  ended_at: string | null;
}

export function saveJobHistoryRow(row: JobHistoryRow): void {
  db.prepare(`
    INSERT OR REPLACE INTO job_history (
      id, kind, label, session_name, state, progress_completed, progress_total,
      result_json, error_kind, error_message, created_at, started_at, ended_at
    ) VALUES (
      @id, @kind, @label, @session_name, @state, @progress_completed, @progress_total,
      @result_json, @error_kind, @error_message, @created_at, @started_at, @ended_at
    )
  `).run(row);
}

export function listJobHistoryRows(limit: number, sessionName?: string): JobHistoryRow[] {
  if (sessionName) {
    return db.prepare<[string, number], JobHistoryRow>(
      'SELECT * FROM job_history WHERE session_name = ? ORDER BY ended_at DESC LIMIT ?',
    ).all(sessionName, limit);
  }
  return db.prepare<[number], JobHistoryRow>('SELECT * FROM job_history ORDER BY ended_at DESC LIMIT ?').all(limit);
}

export function pruneJobHistory(keep: number): number {
  return db.prepare(`
    DELETE FROM job_history WHERE id NOT IN (
      SELECT id FROM job_history ORDER BY ended_at DESC LIMIT ?
    )
  `).run(keep).changes;
}
