/**
 * Cycle Controller: top-level state machine of an SCF run.
 *
 * Phases:
 *   init → stage-select → pipeline → convergence-check → mode-switch-check
 *        → restart-check → signal-check → (stage-select | terminated)
 *
 * Every phase change is validated against PHASE_TRANSITIONS and, when a
 * ledger is attached, recorded with a per-run sequence number. Failures from
 * the layers below arrive as CycleError and end the run with a typed outcome;
 * exit codes are assigned by the caller.
 */

import * as crypto from 'crypto';
import { HISTORY_TAGS, MINIMIZATION } from './config';
import { type ConvergenceEvaluator, evaluateForces } from './convergence_evaluator';
import type { ControlChannel } from './control_signals';
import { clearCorrelation, createLogger, setCorrelation } from './logger';
import type { MinimizationModeSwitch } from './minimization_mode_switch';
import type { MixingHistory } from './mixing_files';
import { completeIteration, type RestartPolicy } from './restart_policy';
import type { RunLedger } from './run_ledger';
import type { CriterionReport, RunLog } from './run_log';
import type { ScfHistory } from './scf_history';
import type {
    ConvergenceFlags,
    CriterionName,
    CycleOutcome,
    DiagonalizationMode,
    IterationState,
    StageLabel,
} from './scf_types';
import { type IterationPipeline, PIPELINE_ORDER } from './stage_pipeline';
import { createStructuredError, CycleError, ErrorFactory, type StructuredError } from './structured_error';

const log = createLogger('controller');

const STEP_METRIC_PATTERN = /GREED:\s*([-+0-9.EeDd]+)/;
const ITERATION_HEADER = /^:ITE\d{3}:/;

/* -------------------------------------------------------------------------- */
/* Phases                                                                     */
/* -------------------------------------------------------------------------- */

export type CyclePhase =
    | 'init'
    | 'stage-select'
    | 'pipeline'
    | 'convergence-check'
    | 'mode-switch-check'
    | 'restart-check'
    | 'signal-check'
    | 'terminated';

const PHASE_TRANSITIONS: Record<CyclePhase, CyclePhase[]> = {
    'init': ['stage-select', 'terminated'],
    'stage-select': ['pipeline'],
    'pipeline': ['convergence-check', 'terminated'],
    'convergence-check': ['mode-switch-check', 'terminated'],
    'mode-switch-check': ['restart-check', 'terminated'],
    'restart-check': ['signal-check', 'terminated'],
    'signal-check': ['stage-select', 'terminated'],
    'terminated': [],
};

export function isValidPhaseTransition(from: CyclePhase, to: CyclePhase): boolean {
    return PHASE_TRANSITIONS[from].includes(to);
}

/* -------------------------------------------------------------------------- */
/* Configuration                                                              */
/* -------------------------------------------------------------------------- */

export interface CriteriaThresholds {
    energy?: number;
    charge?: number;
    force?: number;
}

export interface CycleConfig {
    caseName: string;
    workDir: string;
    maxIterations: number;
    restartInterval: number;
    criteria: CriteriaThresholds;
    /** Number of atomic sites to check for forces; defaults to the sites found in the history. */
    atomCount?: number;
    /** Entry point of the first iteration only. */
    startAt: StageLabel;
    /** Previous-cycle copy the density was restored from before the run, if any. */
    restoredFrom?: string;
    /** Keep mixing history from a previous run instead of purging it at start. */
    keepHistory: boolean;
    /** RMS force at or below which adaptive minimization reports itself ready. */
    readyThreshold: number;
    /** Echoed into the run log header. */
    optionSummary?: string[];
}

export interface CycleControllerDeps {
    config: CycleConfig;
    pipeline: IterationPipeline;
    evaluator: ConvergenceEvaluator;
    signals: ControlChannel;
    history: ScfHistory;
    mixingHistory: Pick<MixingHistory, 'exists' | 'purge'>;
    modeSwitch: MinimizationModeSwitch;
    restartPolicy: RestartPolicy;
    runLog: RunLog;
    ledger?: RunLedger;
    runId?: string;
}

/* -------------------------------------------------------------------------- */
/* Pure decisions                                                             */
/* -------------------------------------------------------------------------- */

const CRITERIA: CriterionName[] = ['energy', 'charge', 'force'];

export function initialFlags(criteria: CriteriaThresholds): ConvergenceFlags {
    return {
        energy: criteria.energy !== undefined ? 'pending' : 'not-requested',
        charge: criteria.charge !== undefined ? 'pending' : 'not-requested',
        force: criteria.force !== undefined ? 'pending' : 'not-requested',
    };
}

export function allRequestedConverged(flags: ConvergenceFlags): boolean {
    return CRITERIA.every(name => flags[name] !== 'pending');
}

export interface TerminationInput {
    iterations: number;
    remaining: number;
    stopRequested: boolean;
    flags: ConvergenceFlags;
    adaptivePending: boolean;
}

/** Terminal outcome after a completed iteration, or null to continue. */
export function decideTermination(input: TerminationInput): CycleOutcome | null {
    const { iterations, remaining, stopRequested, flags, adaptivePending } = input;

    if (stopRequested) return { kind: 'stopped', iterations };
    if (allRequestedConverged(flags) && !adaptivePending) return { kind: 'converged', iterations };
    if (remaining > 0) return null;

    if (flags.force === 'pending') return { kind: 'force-not-converged', iterations };
    return {
        kind: 'not-converged',
        iterations,
        unconverged: CRITERIA.filter(name => flags[name] === 'pending'),
    };
}

export function describeOutcome(outcome: CycleOutcome): string {
    const n = `${outcome.iterations} iteration${outcome.iterations === 1 ? '' : 's'}`;
    switch (outcome.kind) {
        case 'converged':
            return `stop: SCF converged after ${n}`;
        case 'stopped':
            return `stop: halted by operator signal after ${n}`;
        case 'force-not-converged':
            return `stop: iteration budget exhausted after ${n}, forces not converged`;
        case 'not-converged':
            return outcome.unconverged.length > 0
                ? `stop: iteration budget exhausted after ${n}, not converged: ${outcome.unconverged.join(', ')}`
                : `stop: iteration budget exhausted after ${n}, adaptive minimization still active`;
        case 'missing-input':
            return `stop error: ${outcome.artifact} missing or empty for stage ${outcome.stage}`;
        case 'stage-failed':
            return `stop error: stage ${outcome.stage} exited with status ${outcome.exitCode}`;
        case 'comparison-failed':
            return `stop error: convergence comparison for ${outcome.quantity} failed: ${outcome.message}`;
        case 'io-failed':
            return `stop error: ${outcome.message}`;
    }
}

/** Count of iteration headers already in the history, so cycle labels continue across runs. */
export function completedCycles(history: ScfHistory): number {
    return history.lines().filter(line => ITERATION_HEADER.test(line)).length;
}

/* -------------------------------------------------------------------------- */
/* Controller                                                                 */
/* -------------------------------------------------------------------------- */

interface IterationReport {
    diagMode: DiagonalizationMode | null;
    restartFired: boolean;
    demoted: boolean;
}

export class CycleController {
    private readonly deps: CycleControllerDeps;
    private readonly runId: string;
    private phase: CyclePhase = 'init';
    private state: IterationState;
    private flags: ConvergenceFlags;
    private ledgerHealthy = true;
    private failure: StructuredError | null = null;

    constructor(deps: CycleControllerDeps) {
        this.deps = deps;
        this.runId = deps.runId ?? crypto.randomUUID();
        this.state = {
            iteration: 0,
            remaining: deps.config.maxIterations,
            restartCountdown: deps.config.restartInterval,
            cycleIndex: 0,
        };
        this.flags = initialFlags(deps.config.criteria);
    }

    get currentPhase(): CyclePhase {
        return this.phase;
    }

    get iterationState(): Readonly<IterationState> {
        return this.state;
    }

    get convergenceFlags(): Readonly<ConvergenceFlags> {
        return this.flags;
    }

    /** Structured error behind a failure outcome, with operator recovery options. */
    get lastFailure(): StructuredError | null {
        return this.failure;
    }

    get id(): string {
        return this.runId;
    }

    async run(): Promise<CycleOutcome> {
        if (this.phase !== 'init') throw new Error(`controller already ran (phase ${this.phase})`);

        let outcome: CycleOutcome | null = null;
        try {
            this.init();
            while (outcome === null) {
                outcome = await this.iterate();
            }
        } catch (e) {
            if (!(e instanceof CycleError)) {
                this.deps.runLog.final(`stop error: ${e instanceof Error ? e.message : String(e)}`);
                this.finishLedger('internal-error');
                clearCorrelation();
                throw e;
            }
            outcome = this.outcomeFromError(e);
        }
        return this.finish(outcome);
    }

    /* ------------------------------ phases ------------------------------ */

    private init(): void {
        const { config, runLog, mixingHistory, history } = this.deps;
        setCorrelation({ runId: this.runId, iteration: 0, stage: '' });

        this.audit(ledger => ledger.startRun({ run_id: this.runId, case_name: config.caseName, work_dir: config.workDir }));
        runLog.runHeader(config.caseName, config.workDir, this.runId, config.optionSummary ?? []);
        if (config.restoredFrom) runLog.note(`density restored from ${config.restoredFrom}`);

        if (!config.keepHistory) {
            const purged = mixingHistory.purge();
            if (purged.length > 0) runLog.note(`mixing history removed (${purged.length} files)`);
        }

        this.state = { ...this.state, cycleIndex: completedCycles(history) };
        log.info('run started', {
            case: config.caseName,
            max_iterations: config.maxIterations,
            criteria: this.flags,
            start_at: config.startAt,
        });
    }

    private async iterate(): Promise<CycleOutcome | null> {
        const { config, pipeline, runLog } = this.deps;

        this.transition('stage-select');
        const first = this.state.iteration === 0;
        this.state = { ...this.state, iteration: this.state.iteration + 1, cycleIndex: this.state.cycleIndex + 1 };
        const startAt = first ? config.startAt : PIPELINE_ORDER[0];
        setCorrelation({ iteration: this.state.iteration });
        runLog.cycleHeader(this.state.cycleIndex, this.state.remaining, config.maxIterations);

        this.transition('pipeline');
        const result = await pipeline.runIteration({
            iteration: this.state.iteration,
            cycleIndex: this.state.cycleIndex,
            startAt,
            forceRequested: config.criteria.force !== undefined,
            forceConverged: this.flags.force === 'converged',
        });
        if (result.kind === 'missing-input') {
            this.failure = ErrorFactory.missingInput(result.stage, result.artifact).structured;
            return { kind: 'missing-input', iterations: this.state.iteration, stage: result.stage, artifact: result.artifact };
        }

        this.transition('convergence-check');
        await this.checkConvergence();

        this.transition('mode-switch-check');
        let demoted = await this.checkModeSwitch();

        this.transition('restart-check');
        const restart = this.deps.restartPolicy.evaluate(completeIteration(this.state));
        this.state = restart.state;
        if (restart.fired) runLog.note(`restart: mixing history purged (${restart.purged.length} files)`);

        this.transition('signal-check');
        const stopRequested = this.deps.signals.consume('stop');
        if (!stopRequested && this.deps.modeSwitch.active && this.deps.signals.consume('abort-adaptive-mode')) {
            demoted = this.demote('operator abort signal') || demoted;
        }

        this.recordIteration({
            diagMode: result.diagonalization?.mode ?? null,
            restartFired: restart.fired,
            demoted,
        });

        return decideTermination({
            iterations: this.state.iteration,
            remaining: this.state.remaining,
            stopRequested,
            flags: this.flags,
            adaptivePending: this.deps.modeSwitch.active,
        });
    }

    private async checkConvergence(): Promise<void> {
        const { config, evaluator, history, runLog } = this.deps;
        const reports: CriterionReport[] = [];

        if (config.criteria.energy !== undefined) {
            const verdict = await evaluator.evaluate(HISTORY_TAGS.ENERGY, history.file, config.criteria.energy);
            this.flags.energy = verdict.converged ? 'converged' : 'pending';
            reports.push({ name: 'energy', threshold: config.criteria.energy, converged: verdict.converged, deltas: verdict.lastDeltas });
        }
        if (config.criteria.charge !== undefined) {
            const verdict = await evaluator.evaluate(HISTORY_TAGS.CHARGE, history.file, config.criteria.charge);
            this.flags.charge = verdict.converged ? 'converged' : 'pending';
            reports.push({ name: 'charge', threshold: config.criteria.charge, converged: verdict.converged, deltas: verdict.lastDeltas });
        }
        if (config.criteria.force !== undefined) {
            const forces = await evaluateForces(evaluator, history, config.criteria.force, config.atomCount);
            this.flags.force = forces.converged ? 'converged' : 'pending';
            reports.push({ name: 'force', threshold: config.criteria.force, converged: forces.converged, deltas: [], sites: forces.sites });
        }

        runLog.verdicts(reports, this.flags);
        log.info('convergence checked', { ...this.flags });
    }

    private async checkModeSwitch(): Promise<boolean> {
        const { modeSwitch, evaluator, history, config } = this.deps;
        if (!modeSwitch.active) return false;

        const rms = history.lastNumber(HISTORY_TAGS.FORCE_RMS);
        const tightEnergy = await evaluator.evaluate(HISTORY_TAGS.ENERGY, history.file, MINIMIZATION.TIGHT_ENERGY_THRESHOLD);
        const tightCharge = await evaluator.evaluate(HISTORY_TAGS.CHARGE, history.file, MINIMIZATION.TIGHT_CHARGE_THRESHOLD);

        const action = modeSwitch.observe({
            nativeReady: rms !== null && Math.abs(rms) <= config.readyThreshold,
            tightEnergyConverged: tightEnergy.converged,
            tightChargeConverged: tightCharge.converged,
            lastStepMetric: history.lastCaptured(HISTORY_TAGS.MIXER, STEP_METRIC_PATTERN),
        });
        if (action === 'demote') {
            this.deps.runLog.note(`${MINIMIZATION.ADAPTIVE_VARIANT} -> ${MINIMIZATION.FIXED_STEP_VARIANT}, step ${modeSwitch.state.stepSize}`);
            return true;
        }
        return false;
    }

    private demote(reason: string): boolean {
        const { modeSwitch, history, runLog } = this.deps;
        const step = modeSwitch.demote(history.lastCaptured(HISTORY_TAGS.MIXER, STEP_METRIC_PATTERN), reason);
        if (step === null) return false;
        runLog.note(`${MINIMIZATION.ADAPTIVE_VARIANT} -> ${MINIMIZATION.FIXED_STEP_VARIANT} (${reason}), step ${step}`);
        return true;
    }

    /* ----------------------------- terminal ----------------------------- */

    private outcomeFromError(e: CycleError): CycleOutcome {
        const iterations = this.state.iteration;
        const context = e.structured.context;
        this.failure = e.structured;
        log.error(e.message, { code: e.code });

        switch (e.code) {
            case 'STAGE_FAILED':
                return {
                    kind: 'stage-failed',
                    iterations,
                    stage: typeof context.stage === 'string' ? context.stage : 'unknown',
                    exitCode: typeof context.exit_code === 'number' ? context.exit_code : 1,
                };
            case 'COMPARISON_TOOL_FAILED':
                return {
                    kind: 'comparison-failed',
                    iterations,
                    quantity: typeof context.quantity === 'string' ? context.quantity : 'unknown',
                    message: e.message,
                };
            default:
                return { kind: 'io-failed', iterations, message: e.message };
        }
    }

    private finish(outcome: CycleOutcome): CycleOutcome {
        this.transition('terminated');
        const message = describeOutcome(outcome);
        this.deps.runLog.final(message);
        for (const option of this.failure?.recovery_options ?? []) {
            this.deps.runLog.note(`recovery (${option.risk_level}): ${option.description}${option.command ? ` [${option.command}]` : ''}`);
        }

        if (outcome.kind === 'converged') log.info(message, { iterations: outcome.iterations });
        else log.warn(message, { outcome: outcome.kind, iterations: outcome.iterations });

        this.finishLedger(outcome.kind);
        clearCorrelation();
        return outcome;
    }

    /* ------------------------------ ledger ------------------------------ */

    private transition(to: CyclePhase): void {
        const from = this.phase;
        if (!isValidPhaseTransition(from, to)) {
            throw new Error(`invalid phase transition ${from} -> ${to}`);
        }
        this.phase = to;
        log.debug('phase', { from, to });
        this.audit(ledger => ledger.recordTransition(this.runId, from, to, this.state.iteration));
    }

    private recordIteration(report: IterationReport): void {
        this.audit(ledger => ledger.recordIteration(this.runId, {
            iteration: this.state.iteration,
            cycle_index: this.state.cycleIndex,
            diag_mode: report.diagMode,
            energy: this.flags.energy,
            charge: this.flags.charge,
            force: this.flags.force,
            restart_fired: report.restartFired,
            demoted: report.demoted,
        }));
    }

    private finishLedger(outcome: string): void {
        this.audit(ledger => ledger.finishRun(this.runId, outcome, this.state.iteration));
    }

    // The ledger is an audit trail; once it fails the run continues without it
    private audit(write: (ledger: RunLedger) => void): void {
        const ledger = this.deps.ledger;
        if (!ledger || !this.ledgerHealthy) return;
        try {
            write(ledger);
        } catch (e) {
            this.ledgerHealthy = false;
            const err = createStructuredError(
                'LEDGER_FAILURE',
                `run ledger write failed: ${e instanceof Error ? e.message : String(e)}`,
                { run_id: this.runId, phase: this.phase }
            );
            log.warn(err.message, { code: err.code, severity: err.severity });
        }
    }
}
