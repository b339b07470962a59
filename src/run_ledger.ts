/* Run Ledger: SQLite audit of controller runs
 *
 * Records every run, every completed iteration (diagonalization mode,
 * criterion states, restart and demotion events) and every controller phase
 * transition with a monotonically increasing sequence number per run.
 * Optional: the controller works without one.
 *
 * CONTRACT: Synchronous API (better-sqlite3 is blocking)
 */

import Database from "better-sqlite3";
import * as crypto from "crypto";
import { LEDGER } from "./config";
import { createLogger } from "./logger";
import type { CriterionStatus, DiagonalizationMode } from "./scf_types";

const log = createLogger('ledger');

// ===========================
// Types
// ===========================

export interface IterationRecord {
    iteration: number;
    cycle_index: number;
    diag_mode: DiagonalizationMode | null;
    energy: CriterionStatus;
    charge: CriterionStatus;
    force: CriterionStatus;
    restart_fired: boolean;
    demoted: boolean;
}

export interface RunRecord {
    run_id: string;
    case_name: string;
    work_dir: string;
    started_at: string;
    finished_at: string | null;
    outcome: string | null;
    iterations: number;
    transition_seq: number;
}

export interface TransitionRecord {
    from_phase: string;
    to_phase: string;
    iteration: number;
    transition_seq: number;
}

interface IterationRow {
    iteration: number;
    cycle_index: number;
    diag_mode: string | null;
    energy: string;
    charge: string;
    force: string;
    restart_fired: number;
    demoted: number;
}

export interface RunLedger {
    startRun(run: { run_id: string; case_name: string; work_dir: string }): void;
    recordTransition(run_id: string, from_phase: string, to_phase: string, iteration: number): void;
    recordIteration(run_id: string, record: IterationRecord): void;
    finishRun(run_id: string, outcome: string, iterations: number): void;
    close(): void;
}

// ===========================
// Utilities
// ===========================

function nowIso(): string {
    return new Date().toISOString();
}

function sleepMs(ms: number) {
    Atomics.wait(new Int32Array(new SharedArrayBuffer(4)), 0, 0, ms);
}

function sqliteIsBusyError(e: unknown): boolean {
    const msg = e instanceof Error ? e.message : String(e);
    return msg.includes("SQLITE_BUSY") || msg.includes("database is locked");
}

function withSqliteRetry<T>(fn: () => T, maxAttempts = 3): T {
    let attempt = 1;
    while (true) {
        try {
            return fn();
        } catch (e) {
            if (sqliteIsBusyError(e) && attempt < maxAttempts) {
                sleepMs(50 * attempt);
                attempt++;
                continue;
            }
            throw e;
        }
    }
}

function toCriterionStatus(value: string): CriterionStatus {
    return value === 'converged' || value === 'pending' ? value : 'not-requested';
}

function toDiagonalizationMode(value: string | null): DiagonalizationMode | null {
    switch (value) {
        case 'full':
        case 'reuse-cached-basis':
        case 'rebuild-cached-inverse':
        case 'rebuild-cached-inverse-no-inverse-cache':
            return value;
        default:
            return null;
    }
}

// ===========================
// SQLite Schema
// ===========================

function applySchema(db: Database.Database) {
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    db.pragma(`busy_timeout = ${LEDGER.BUSY_TIMEOUT_MS}`);

    db.exec(`
    CREATE TABLE IF NOT EXISTS runs (
      run_id TEXT PRIMARY KEY,
      case_name TEXT NOT NULL,
      work_dir TEXT NOT NULL,
      started_at TEXT NOT NULL,
      finished_at TEXT,
      outcome TEXT,
      iterations INTEGER NOT NULL DEFAULT 0,
      transition_seq INTEGER NOT NULL DEFAULT 0
    );

    CREATE TABLE IF NOT EXISTS iterations (
      run_id TEXT NOT NULL,
      iteration INTEGER NOT NULL,
      cycle_index INTEGER NOT NULL,
      diag_mode TEXT,
      energy TEXT NOT NULL,
      charge TEXT NOT NULL,
      force TEXT NOT NULL,
      restart_fired INTEGER NOT NULL,
      demoted INTEGER NOT NULL,
      completed_at TEXT NOT NULL,
      PRIMARY KEY(run_id, iteration),
      FOREIGN KEY(run_id) REFERENCES runs(run_id) ON DELETE CASCADE
    );

    CREATE TABLE IF NOT EXISTS phase_audit_log (
      event_id TEXT PRIMARY KEY,
      run_id TEXT NOT NULL,
      from_phase TEXT NOT NULL,
      to_phase TEXT NOT NULL,
      iteration INTEGER NOT NULL,
      timestamp TEXT NOT NULL,
      transition_seq INTEGER NOT NULL,
      FOREIGN KEY(run_id) REFERENCES runs(run_id) ON DELETE CASCADE
    );

    CREATE INDEX IF NOT EXISTS idx_phase_audit_run ON phase_audit_log(run_id, transition_seq);
  `);
}

// ===========================
// SqliteRunLedger
// ===========================

export class SqliteRunLedger implements RunLedger {
    private readonly db: Database.Database;

    constructor(dbPath: string) {
        this.db = new Database(dbPath);
        applySchema(this.db);
        log.debug('ledger opened', { path: dbPath });
    }

    startRun(run: { run_id: string; case_name: string; work_dir: string }): void {
        withSqliteRetry(() => {
            this.db
                .prepare(`INSERT INTO runs(run_id, case_name, work_dir, started_at) VALUES(?, ?, ?, ?)`)
                .run(run.run_id, run.case_name, run.work_dir, nowIso());
        });
    }

    recordTransition(run_id: string, from_phase: string, to_phase: string, iteration: number): void {
        withSqliteRetry(() => {
            const tx = this.db.transaction(() => {
                const row = this.db
                    .prepare<[string], { transition_seq: number }>(`SELECT transition_seq FROM runs WHERE run_id=?`)
                    .get(run_id);
                if (!row) throw new Error(`run ${run_id} not in ledger`);
                const nextSeq = row.transition_seq + 1;

                this.db.prepare(`UPDATE runs SET transition_seq=? WHERE run_id=?`).run(nextSeq, run_id);
                this.db
                    .prepare(
                        `INSERT INTO phase_audit_log(event_id, run_id, from_phase, to_phase, iteration, timestamp, transition_seq)
             VALUES(?,?,?,?,?,?,?)`
                    )
                    .run(crypto.randomUUID(), run_id, from_phase, to_phase, iteration, nowIso(), nextSeq);
            });
            tx();
        });
    }

    recordIteration(run_id: string, record: IterationRecord): void {
        withSqliteRetry(() => {
            this.db
                .prepare(
                    `INSERT OR REPLACE INTO iterations(run_id, iteration, cycle_index, diag_mode, energy, charge, force, restart_fired, demoted, completed_at)
           VALUES(?,?,?,?,?,?,?,?,?,?)`
                )
                .run(
                    run_id, record.iteration, record.cycle_index, record.diag_mode,
                    record.energy, record.charge, record.force,
                    record.restart_fired ? 1 : 0, record.demoted ? 1 : 0, nowIso()
                );
        });
    }

    finishRun(run_id: string, outcome: string, iterations: number): void {
        withSqliteRetry(() => {
            this.db
                .prepare(`UPDATE runs SET finished_at=?, outcome=?, iterations=? WHERE run_id=?`)
                .run(nowIso(), outcome, iterations, run_id);
        });
    }

    getRun(run_id: string): RunRecord | null {
        const row = this.db.prepare<[string], RunRecord>(`SELECT * FROM runs WHERE run_id=?`).get(run_id);
        return row ?? null;
    }

    listTransitions(run_id: string): TransitionRecord[] {
        return this.db
            .prepare<[string], TransitionRecord>(
                `SELECT from_phase, to_phase, iteration, transition_seq FROM phase_audit_log WHERE run_id=? ORDER BY transition_seq`
            )
            .all(run_id);
    }

    listIterations(run_id: string): IterationRecord[] {
        return this.db
            .prepare<[string], IterationRow>(
                `SELECT iteration, cycle_index, diag_mode, energy, charge, force, restart_fired, demoted
         FROM iterations WHERE run_id=? ORDER BY iteration`
            )
            .all(run_id)
            .map(row => ({
                iteration: row.iteration,
                cycle_index: row.cycle_index,
                diag_mode: toDiagonalizationMode(row.diag_mode),
                energy: toCriterionStatus(row.energy),
                charge: toCriterionStatus(row.charge),
                force: toCriterionStatus(row.force),
                restart_fired: row.restart_fired === 1,
                demoted: row.demoted === 1,
            }));
    }

    close(): void {
        this.db.close();
    }
}
