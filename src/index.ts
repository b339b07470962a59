/**
 * Main entry point - exports all public APIs
 */

export type * from './scf_types';
export { CYCLE_DEFAULTS, EXIT_CODES, HISTORY_TAGS, MINIMIZATION, SIGNAL_FILES } from './config';
export { createLogger } from './logger';
export type { Logger, LogLevel } from './logger';
export { CycleError, ErrorFactory } from './structured_error';
export type { ErrorCode, RecoveryOption, StructuredError } from './structured_error';
export { CaseFiles } from './case_files';
export { ScfHistory } from './scf_history';
export { execaExecutor } from './command_executor';
export type { CommandExecutor, CommandResult } from './command_executor';
export {
    ExternalConvergenceEvaluator,
    HistoryConvergenceEvaluator,
    evaluateForces,
    reduceForceVerdicts
} from './convergence_evaluator';
export type { ConvergenceEvaluator, ConvergenceVerdict } from './convergence_evaluator';
export { StageRunner } from './stage_runner';
export type { StageRunnerInterface, StageRunnerOptions } from './stage_runner';
export { FileControlChannel, MemoryControlChannel } from './control_signals';
export type { ControlChannel } from './control_signals';
export { IterativeDiagonalizationState } from './diagonalization_state';
export type { CacheInventory, DiagonalizationConfig } from './diagonalization_state';
export { MixerInput, MixingHistory } from './mixing_files';
export { MinimizationModeSwitch, computeStepSize } from './minimization_mode_switch';
export type { ModeSwitchSnapshot } from './minimization_mode_switch';
export { RestartPolicy, completeIteration } from './restart_policy';
export { PIPELINE_ORDER, StagePipeline } from './stage_pipeline';
export type { IterationPipeline, PipelineConfig, PipelineResult } from './stage_pipeline';
export { RunLog } from './run_log';
export { SqliteRunLedger } from './run_ledger';
export type { RunLedger } from './run_ledger';
export {
    CycleController,
    decideTermination,
    describeOutcome,
    isValidPhaseTransition
} from './cycle_controller';
export type { CycleConfig, CycleControllerDeps, CyclePhase } from './cycle_controller';
export { parseOptions } from './options';
export type { ScfOptions } from './options';
export { assembleRun, outcomeExitCode } from './cli';
