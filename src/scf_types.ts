export type CriterionName = 'energy' | 'charge' | 'force';
export type CriterionStatus = 'not-requested' | 'pending' | 'converged';

export type ConvergenceFlags = Record<CriterionName, CriterionStatus>;

export interface IterationState {
    iteration: number;          // completed-or-running iteration, starts at 0 before the first
    remaining: number;          // decreases from maxIterations
    restartCountdown: number;   // decreases from restartInterval, reset when a restart fires
    cycleIndex: number;         // label printed in the run log and history header
}

export type DiagonalizationMode =
    | 'full'
    | 'reuse-cached-basis'
    | 'rebuild-cached-inverse'
    | 'rebuild-cached-inverse-no-inverse-cache';

export interface DiagonalizationDecision {
    mode: DiagonalizationMode;
    flags: string[];
}

export type BasisExtrapolation = 'pratt' | 'carry-forward';

export interface MinimizationModeState {
    active: boolean;
    counter: number;
    stepSize: number | null;
}

export type KpointSet = 'fbz' | 'ibz';
export type HartreeFockSubMode = 'full-zone' | 'irreducible-zone';

export interface StageFlags {
    parallel?: boolean;
    complex?: boolean;
    spinOrbit?: boolean;
    kpointSet?: KpointSet;
    response?: boolean;
    hartreeFock?: HartreeFockSubMode;
    extra?: string[];
}

export type StageLabel =
    | 'secondary-potential'
    | 'potential'
    | 'force-relabel'
    | 'in1-regeneration'
    | 'eigen'
    | 'spin-orbit'
    | 'density'
    | 'density-full-zone'
    | 'hartree-fock'
    | 'density-irreducible-zone'
    | 'eigen-semicore'
    | 'density-semicore'
    | 'core'
    | 'core-superposition'
    | 'aggregate'
    | 'save-previous'
    | 'mixer'
    | 'response-mixer';

export interface StageInvocation {
    stage: StageLabel;
    program: string;
    flags: StageFlags;
    requiredInput?: string;
}

export type StageRunOutcome =
    | { status: 'completed'; stage: StageLabel; durationMs: number }
    | { status: 'missing-input'; stage: StageLabel; artifact: string };

export type ControlSignal =
    | 'stop'
    | 'force-full-diagonalization'
    | 'drop-cached-inverse'
    | 'abort-adaptive-mode';

export interface ForceSiteVerdict {
    site: number;
    converged: boolean;
    deltas: number[];
}

export type CycleOutcome =
    | { kind: 'converged'; iterations: number }
    | { kind: 'stopped'; iterations: number }
    | { kind: 'force-not-converged'; iterations: number }
    | { kind: 'not-converged'; iterations: number; unconverged: CriterionName[] }
    | { kind: 'missing-input'; iterations: number; stage: StageLabel; artifact: string }
    | { kind: 'stage-failed'; iterations: number; stage: string; exitCode: number }
    | { kind: 'comparison-failed'; iterations: number; quantity: string; message: string }
    | { kind: 'io-failed'; iterations: number; message: string };

export type Result<T> = { ok: true; value: T } | { ok: false; error: string; message?: string };
