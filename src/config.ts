/**
 * Shared Configuration Constants
 *
 * Centralized defaults for the SCF cycle controller.
 * Values can be overridden via environment variables; CLI options override both.
 */

function envNumber(name: string, fallback: number): number {
    const raw = process.env[name];
    if (raw === undefined || raw.trim() === '') return fallback;
    const parsed = Number(raw);
    return Number.isFinite(parsed) ? parsed : fallback;
}

// Iteration budget and stagnation restart cadence
export const CYCLE_DEFAULTS = {
    MAX_ITERATIONS: envNumber('SCF_MAX_ITERATIONS', 40),
    RESTART_INTERVAL: envNumber('SCF_RESTART_INTERVAL', 99),
    // Used when no criterion is requested on the command line
    ENERGY_THRESHOLD: envNumber('SCF_ENERGY_THRESHOLD', 0.0001),
};

// Iterative diagonalization: 0 disables the periodic full rebuild
export const DIAGONALIZATION_DEFAULTS = {
    REBUILD_PERIOD: envNumber('SCF_FULL_DIAG_PERIOD', 0),
};

// Adaptive minimization (MSR1a) demotion
export const MINIMIZATION = {
    ADAPTIVE_VARIANT: 'MSR1a',
    FIXED_STEP_VARIANT: 'MSR1',
    HYSTERESIS_SATURATION: 3,
    STEP_SIZE_FLOOR: 0.05,
    TIGHT_ENERGY_THRESHOLD: envNumber('SCF_TIGHT_ENERGY', 0.0001),
    TIGHT_CHARGE_THRESHOLD: envNumber('SCF_TIGHT_CHARGE', 0.001),
    // Native readiness: last :FRMS below this when no force criterion is given
    READY_THRESHOLD: envNumber('SCF_READY_THRESHOLD', 1.0),
};

// History tags written by the stages into <case>.scf
export const HISTORY_TAGS = {
    ENERGY: ':ENE',
    CHARGE: ':DIS',
    FORCE_PREFIX: ':FGL',
    FORCE_RMS: ':FRMS',
    MIXER: ':MIX',
} as const;

// Stage launcher prefix (e.g. "x" for `x lapw0 -p`); empty runs the program directly
export const STAGE_LAUNCHER = process.env.SCF_STAGE_LAUNCHER || '';

// Control files polled at iteration boundaries, relative to the case directory
export const SIGNAL_FILES = {
    stop: '.stop',
    'force-full-diagonalization': '.fulldiag',
    'drop-cached-inverse': '.noHinv',
    'abort-adaptive-mode': '.minstop',
} as const;

// Process exit codes, mapped from CycleOutcome at the CLI boundary only
export const EXIT_CODES = {
    CONVERGED: 0,
    STAGE_FAILED: 1,
    STOPPED: 2,
    FORCE_NOT_CONVERGED: 3,
    NOT_CONVERGED: 4,
    MISSING_INPUT: 5,
    COMPARISON_FAILED: 6,
    IO_FAILED: 7,
    INVALID_OPTIONS: 64,
    // Unexpected error escaping the controller
    INTERNAL_ERROR: 70,
} as const;

// SQLite ledger
export const LEDGER = {
    BUSY_TIMEOUT_MS: 5000,
};
