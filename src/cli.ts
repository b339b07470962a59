#!/usr/bin/env node
/**
 * CLI Entry Point for scfctl
 */

import * as fs from 'fs';
import { CaseFiles } from './case_files';
import { type CommandExecutor, execaExecutor } from './command_executor';
import { EXIT_CODES, MINIMIZATION } from './config';
import { type ControlChannel, FileControlChannel } from './control_signals';
import { ExternalConvergenceEvaluator, HistoryConvergenceEvaluator } from './convergence_evaluator';
import { CycleController, describeOutcome } from './cycle_controller';
import { IterativeDiagonalizationState } from './diagonalization_state';
import { MinimizationModeSwitch } from './minimization_mode_switch';
import { MixerInput, MixingHistory } from './mixing_files';
import { parseOptions, type ScfOptions, USAGE } from './options';
import { RestartPolicy } from './restart_policy';
import { SqliteRunLedger } from './run_ledger';
import { RunLog } from './run_log';
import { ScfHistory } from './scf_history';
import type { CycleOutcome } from './scf_types';
import { chooseEntry, StagePipeline } from './stage_pipeline';
import { StageRunner } from './stage_runner';
import { CycleError, ErrorFactory, type StructuredError } from './structured_error';

export function outcomeExitCode(outcome: CycleOutcome): number {
    switch (outcome.kind) {
        case 'converged': return EXIT_CODES.CONVERGED;
        case 'stopped': return EXIT_CODES.STOPPED;
        case 'force-not-converged': return EXIT_CODES.FORCE_NOT_CONVERGED;
        case 'not-converged': return EXIT_CODES.NOT_CONVERGED;
        case 'missing-input': return EXIT_CODES.MISSING_INPUT;
        case 'stage-failed': return EXIT_CODES.STAGE_FAILED;
        case 'comparison-failed': return EXIT_CODES.COMPARISON_FAILED;
        case 'io-failed': return EXIT_CODES.IO_FAILED;
    }
}

export interface RunOverrides {
    executor?: CommandExecutor;
    signals?: ControlChannel;
    runId?: string;
}

export interface AssembledRun {
    controller: CycleController;
    close(): void;
}

/** Wire the real components for a case directory. */
export function assembleRun(options: ScfOptions, overrides: RunOverrides = {}): AssembledRun {
    const files = new CaseFiles(options.dir, options.caseName);
    const entry = options.startAt !== undefined
        ? { startAt: options.startAt, restoredFrom: null }
        : chooseEntry(files);
    const runLog = new RunLog(files.runLog);
    const history = new ScfHistory(files.history);
    const signals = overrides.signals ?? new FileControlChannel(options.dir);
    const executor = overrides.executor ?? execaExecutor;

    const runner = new StageRunner({ files, runLog, executor, launcher: options.launcher });
    const pipeline = new StagePipeline({
        config: { ...options.pipeline, complex: files.hasContent(files.complexMarker) },
        files,
        runner,
        diagonalization: new IterativeDiagonalizationState(options.diagonalization, signals),
        history,
        runLog,
    });

    const mixingHistory = new MixingHistory(files);
    const mixerInput = new MixerInput(files.mixerInput);
    const modeSwitch = new MinimizationModeSwitch({
        active: mixerInput.variant() === MINIMIZATION.ADAPTIVE_VARIANT,
        mixerInput,
        mixingHistory,
    });

    const evaluator = options.testconv
        ? new ExternalConvergenceEvaluator(options.testconv, executor)
        : new HistoryConvergenceEvaluator();
    const ledger = options.ledgerPath ? new SqliteRunLedger(options.ledgerPath) : undefined;

    const controller = new CycleController({
        config: {
            caseName: options.caseName,
            workDir: options.dir,
            maxIterations: options.maxIterations,
            restartInterval: options.restartInterval,
            criteria: options.criteria,
            atomCount: options.atomCount,
            startAt: entry.startAt,
            restoredFrom: entry.restoredFrom ?? undefined,
            keepHistory: options.keepHistory,
            readyThreshold: options.readyThreshold ?? options.criteria.force ?? MINIMIZATION.READY_THRESHOLD,
            optionSummary: options.summary,
        },
        pipeline,
        evaluator,
        signals,
        history,
        mixingHistory,
        modeSwitch,
        restartPolicy: new RestartPolicy(options.restartInterval, mixingHistory),
        runLog,
        ledger,
        runId: overrides.runId,
    });

    return {
        controller,
        close: () => ledger?.close(),
    };
}

function printRecovery(error: StructuredError): void {
    if (error.recovery_options.length === 0) return;
    console.error('\nRecovery options:');
    for (const option of error.recovery_options) {
        console.error(`   [${option.risk_level}] ${option.description}`);
        if (option.command) console.error(`          ${option.command}`);
    }
}

/** Filesystem failures outside a controller outcome; anything else propagates. */
function ioFailure(e: unknown): number {
    if (!(e instanceof CycleError)) throw e;
    console.error(`Error: ${e.message}`);
    printRecovery(e.structured);
    return EXIT_CODES.IO_FAILED;
}

class ScfCli {
    constructor(private readonly overrides: RunOverrides = {}) { }

    async run(args: string[]): Promise<number> {
        const parsed = parseOptions(args);
        if (!parsed.ok) {
            const err = ErrorFactory.invalidOptions([parsed.message ?? parsed.error]);
            console.error(`Error: ${err.message}`);
            printRecovery(err.structured);
            return EXIT_CODES.INVALID_OPTIONS;
        }

        const options = parsed.value;
        if (options.help) {
            console.log(USAGE);
            return EXIT_CODES.CONVERGED;
        }

        if (!fs.existsSync(options.dir)) {
            const err = ErrorFactory.invalidOptions([`case directory not found: ${options.dir}`]);
            console.error(`Error: ${err.message}`);
            return EXIT_CODES.INVALID_OPTIONS;
        }

        let run: AssembledRun;
        try {
            run = assembleRun(options, this.overrides);
        } catch (e) {
            return ioFailure(e);
        }

        let outcome: CycleOutcome;
        try {
            outcome = await run.controller.run();
        } catch (e) {
            // A CycleError here means the run log could not take the final message
            return ioFailure(e);
        } finally {
            run.close();
        }

        const message = describeOutcome(outcome);
        if (outcome.kind === 'converged') console.log(message);
        else console.error(message);
        if (run.controller.lastFailure) printRecovery(run.controller.lastFailure);

        return outcomeExitCode(outcome);
    }
}

// Run CLI
if (require.main === module) {
    const cli = new ScfCli();
    cli.run(process.argv.slice(2))
        .then(code => {
            process.exitCode = code;
        })
        .catch((err: unknown) => {
            console.error('Fatal error:', err);
            process.exitCode = EXIT_CODES.INTERNAL_ERROR;
        });
}

export { ScfCli };
