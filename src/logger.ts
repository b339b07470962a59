/**
 * Structured Logger for the SCF cycle controller
 *
 * Features:
 * - Log levels: DEBUG, INFO, WARN, ERROR
 * - ISO timestamps on every entry
 * - Structured JSON output (JSONL) when SCF_LOG_JSON=1
 * - Optional file output via SCF_LOG_FILE
 * - Module context (component name) on every line
 * - Run correlation (run id, iteration, stage) propagated through all entries
 *
 * Environment:
 *   SCF_LOG_LEVEL  = debug|info|warn|error (default: info)
 *   SCF_LOG_JSON   = 1 (default: text)
 *   SCF_LOG_FILE   = path (optional, appends)
 *   SCF_DEBUG      = 1 (sets level to debug)
 */

import * as fs from 'fs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

function parseLevel(raw: string | undefined): LogLevel {
    const lowered = (raw || 'info').toLowerCase();
    return lowered === 'debug' || lowered === 'warn' || lowered === 'error' ? lowered : 'info';
}

const MIN_LEVEL: number = LEVEL_ORDER[parseLevel(process.env.SCF_LOG_LEVEL)];
const DEBUG_OVERRIDE = process.env.SCF_DEBUG === '1' || process.env.SCF_DEBUG === 'true';
const EFFECTIVE_MIN = DEBUG_OVERRIDE ? 0 : MIN_LEVEL;

const JSON_MODE = process.env.SCF_LOG_JSON === '1';
const LOG_FILE = process.env.SCF_LOG_FILE || '';

/* -------------------------------------------------------------------------- */
/* Run Correlation Context (singleton)                                        */
/* -------------------------------------------------------------------------- */

let _runId: string = '';
let _iteration: number = 0;
let _stage: string = '';

/** Set the active run correlation context. Called by the controller as the cycle advances. */
export function setCorrelation(opts: { runId?: string; iteration?: number; stage?: string }): void {
    if (opts.runId !== undefined) _runId = opts.runId;
    if (opts.iteration !== undefined) _iteration = opts.iteration;
    if (opts.stage !== undefined) _stage = opts.stage;
}

/** Clear correlation context. Called at run end. */
export function clearCorrelation(): void {
    _runId = '';
    _iteration = 0;
    _stage = '';
}

/* -------------------------------------------------------------------------- */
/* Core emit                                                                  */
/* -------------------------------------------------------------------------- */

function emit(level: LogLevel, component: string, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < EFFECTIVE_MIN) return;

    const ts = new Date().toISOString();

    if (JSON_MODE) {
        const entry: Record<string, unknown> = { ts, level, component, msg: message };
        if (_runId) entry.run_id = _runId;
        if (_iteration) entry.iteration = _iteration;
        if (_stage) entry.stage = _stage;
        if (data) entry.data = data;
        writeOutput(level, JSON.stringify(entry));
    } else {
        const ctx = _runId ? ` [${_runId.slice(0, 8)}${_iteration ? ':' + _iteration : ''}${_stage ? '/' + _stage : ''}]` : '';
        const prefix = `[${ts}] [${level.toUpperCase().padEnd(5)}] [${component}]${ctx}`;
        const line = data
            ? `${prefix} ${message} ${JSON.stringify(data)}`
            : `${prefix} ${message}`;
        writeOutput(level, line);
    }
}

function writeOutput(level: LogLevel, line: string): void {
    switch (level) {
        case 'error': process.stderr.write(line + '\n'); break;
        case 'warn':  process.stderr.write(line + '\n'); break;
        default:      process.stdout.write(line + '\n'); break;
    }

    if (LOG_FILE) {
        try {
            fs.appendFileSync(LOG_FILE, line + '\n');
        } catch (e) {
            process.stderr.write(`[logger] cannot append to ${LOG_FILE}: ${e instanceof Error ? e.message : String(e)}\n`);
        }
    }
}

/* -------------------------------------------------------------------------- */
/* Logger interface                                                           */
/* -------------------------------------------------------------------------- */

export interface Logger {
    debug(msg: string, data?: Record<string, unknown>): void;
    info(msg: string, data?: Record<string, unknown>): void;
    warn(msg: string, data?: Record<string, unknown>): void;
    error(msg: string, data?: Record<string, unknown>): void;
    child(component: string): Logger;
}

export function createLogger(component: string): Logger {
    return {
        debug: (msg, data) => emit('debug', component, msg, data),
        info:  (msg, data) => emit('info',  component, msg, data),
        warn:  (msg, data) => emit('warn',  component, msg, data),
        error: (msg, data) => emit('error', component, msg, data),
        child: (sub) => createLogger(`${component}:${sub}`),
    };
}
