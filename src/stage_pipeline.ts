/**
 * Stage Pipeline: the ordered stage sequence of one SCF iteration.
 *
 * Every stage label maps to a handler, and `successor` walks the fixed
 * order, skipping labels the run configuration disables. A missing required
 * input either ends the iteration with `missing-input` or jumps to the label
 * named in ON_MISSING. Stage failures propagate as CycleError.
 */

import * as fs from 'fs';
import { atomicWriteFileSync } from './atomic_write';
import type { CaseFiles } from './case_files';
import type { IterativeDiagonalizationState } from './diagonalization_state';
import { createLogger, setCorrelation } from './logger';
import { replaceLeadingToken } from './mixing_files';
import type { RunLog } from './run_log';
import type { ScfHistory } from './scf_history';
import type { DiagonalizationDecision, StageFlags, StageInvocation, StageLabel } from './scf_types';
import type { StageRunnerInterface } from './stage_runner';
import { ErrorFactory } from './structured_error';

const log = createLogger('pipeline');

/* -------------------------------------------------------------------------- */
/* Configuration                                                              */
/* -------------------------------------------------------------------------- */

export interface PipelineConfig {
    parallel: boolean;
    complex: boolean;
    spinOrbit: boolean;
    hartreeFock: boolean;
    secondaryPotential: boolean;
    coreSuperposition: boolean;
    responseMixing: boolean;
    /** Regenerate the eigen-stage input every N iterations; 0 disables. */
    in1Every: number;
}

export const STAGE_PROGRAMS = {
    potential: 'lapw0',
    eigen: 'lapw1',
    spinOrbit: 'lapwso',
    density: 'lapw2',
    hartreeFock: 'hf',
    core: 'lcore',
    superposition: 'dstart',
    mixer: 'mixer',
    responseMixer: 'mixer_vresp',
    in1: 'write_in1',
} as const;

export const PIPELINE_ORDER: readonly StageLabel[] = [
    'secondary-potential',
    'potential',
    'force-relabel',
    'in1-regeneration',
    'eigen',
    'spin-orbit',
    'density',
    'density-full-zone',
    'hartree-fock',
    'density-irreducible-zone',
    'eigen-semicore',
    'density-semicore',
    'core',
    'core-superposition',
    'aggregate',
    'save-previous',
    'mixer',
    'response-mixer',
];

// Where a missing required input routes; absent entries end the iteration as missing-input
const ON_MISSING: Partial<Record<StageLabel, StageLabel | null>> = {
    'in1-regeneration': 'eigen',
    'eigen-semicore': 'core',
    'core': 'core-superposition',
    'response-mixer': null,
};

// Summary file suffix each stage writes, aggregated in this order
const STAGE_SUMMARIES: [StageLabel, string][] = [
    ['potential', 'scf0'],
    ['eigen', 'scf1'],
    ['spin-orbit', 'scfso'],
    ['density', 'scf2'],
    ['hartree-fock', 'scfhf'],
    ['density-irreducible-zone', 'scf2'],
    ['eigen-semicore', 'scf1s'],
    ['density-semicore', 'scf2s'],
    ['core', 'scfc'],
];

export function isStageEnabled(label: StageLabel, config: PipelineConfig, iteration: number): boolean {
    switch (label) {
        case 'secondary-potential': return config.secondaryPotential;
        case 'in1-regeneration': return config.in1Every > 0 && iteration % config.in1Every === 0;
        case 'spin-orbit': return config.spinOrbit;
        case 'density': return !config.hartreeFock;
        case 'density-full-zone':
        case 'hartree-fock':
        case 'density-irreducible-zone':
            return config.hartreeFock;
        case 'core-superposition': return config.coreSuperposition;
        case 'response-mixer': return config.responseMixing;
        default: return true;
    }
}

/** First enabled label at or after `label`, or null past the end. */
export function resolveLabel(label: StageLabel | null, config: PipelineConfig, iteration: number): StageLabel | null {
    if (label === null) return null;
    for (let i = PIPELINE_ORDER.indexOf(label); i < PIPELINE_ORDER.length; i++) {
        if (isStageEnabled(PIPELINE_ORDER[i], config, iteration)) return PIPELINE_ORDER[i];
    }
    return null;
}

export function successor(label: StageLabel, config: PipelineConfig, iteration: number): StageLabel | null {
    const index = PIPELINE_ORDER.indexOf(label);
    if (index + 1 >= PIPELINE_ORDER.length) return null;
    return resolveLabel(PIPELINE_ORDER[index + 1], config, iteration);
}

export function isStageLabel(value: string): value is StageLabel {
    return PIPELINE_ORDER.some(label => label === value);
}

export interface EntryDecision {
    startAt: StageLabel;
    /** Copy the density was restored from, when it had to be. */
    restoredFrom: string | null;
}

/**
 * First-iteration entry when no start stage is configured. A case whose
 * density is gone but whose previous-cycle copy survived gets the copy back;
 * with neither on disk the potential stage reports the missing input.
 */
export function chooseEntry(files: CaseFiles): EntryDecision {
    const startAt = PIPELINE_ORDER[0];
    if (files.hasContent(files.density) || !files.hasContent(files.densityPrevious)) {
        return { startAt, restoredFrom: null };
    }

    try {
        fs.copyFileSync(files.densityPrevious, files.density);
    } catch (e) {
        throw ErrorFactory.filesystem('restore density', files.densityPrevious, e);
    }
    log.info('density restored from the previous cycle', { from: files.densityPrevious });
    return { startAt, restoredFrom: files.densityPrevious };
}

/* -------------------------------------------------------------------------- */
/* Density-input relabeling                                                   */
/* -------------------------------------------------------------------------- */

export type DensityKeyword = 'TOT' | 'FOR';

/**
 * Set the leading keyword of the density input (`TOT` total energy only,
 * `FOR` energy plus forces). Returns true when the file was rewritten.
 * Other keywords (QTL, EFG, ...) are left alone.
 */
export function relabelDensityInput(file: string, keyword: DensityKeyword): boolean {
    const lines = fs.readFileSync(file, 'utf-8').split('\n');
    const current = lines[0].trim().split(/\s+/)[0];
    if (current === keyword || (current !== 'TOT' && current !== 'FOR')) return false;
    lines[0] = replaceLeadingToken(lines[0], keyword);
    atomicWriteFileSync({ filePath: file, content: lines.join('\n') });
    return true;
}

/* -------------------------------------------------------------------------- */
/* Pipeline                                                                   */
/* -------------------------------------------------------------------------- */

export interface IterationRequest {
    iteration: number;
    cycleIndex: number;
    startAt: StageLabel;
    forceRequested: boolean;
    forceConverged: boolean;
}

export type PipelineResult =
    | {
        kind: 'completed';
        stagesRun: StageLabel[];
        skipped: StageLabel[];
        diagonalization: DiagonalizationDecision | null;
    }
    | { kind: 'missing-input'; stage: StageLabel; artifact: string; stagesRun: StageLabel[] };

export interface IterationPipeline {
    runIteration(request: IterationRequest): Promise<PipelineResult>;
}

type StepResult = { kind: 'ran' } | { kind: 'skipped' } | { kind: 'missing'; artifact: string };

interface IterationScratch {
    request: IterationRequest;
    stagesRun: StageLabel[];
    skipped: StageLabel[];
    diagonalization: DiagonalizationDecision | null;
}

export interface StagePipelineOptions {
    config: PipelineConfig;
    files: CaseFiles;
    runner: StageRunnerInterface;
    diagonalization: IterativeDiagonalizationState;
    history: ScfHistory;
    runLog: RunLog;
}

export class StagePipeline implements IterationPipeline {
    private readonly config: PipelineConfig;
    private readonly files: CaseFiles;
    private readonly runner: StageRunnerInterface;
    private readonly diagonalization: IterativeDiagonalizationState;
    private readonly history: ScfHistory;
    private readonly runLog: RunLog;

    constructor(options: StagePipelineOptions) {
        this.config = options.config;
        this.files = options.files;
        this.runner = options.runner;
        this.diagonalization = options.diagonalization;
        this.history = options.history;
        this.runLog = options.runLog;
    }

    async runIteration(request: IterationRequest): Promise<PipelineResult> {
        const scratch: IterationScratch = { request, stagesRun: [], skipped: [], diagonalization: null };
        let label = resolveLabel(request.startAt, this.config, request.iteration);

        while (label !== null) {
            setCorrelation({ stage: label });
            const step = await this.runStep(label, scratch);

            if (step.kind === 'missing') {
                if (!(label in ON_MISSING)) {
                    log.error('required input missing', { stage: label, artifact: step.artifact });
                    return { kind: 'missing-input', stage: label, artifact: step.artifact, stagesRun: scratch.stagesRun };
                }
                scratch.skipped.push(label);
                const target = ON_MISSING[label] ?? null;
                log.info('optional stage skipped', { stage: label, artifact: step.artifact, continue_at: target });
                label = resolveLabel(target, this.config, request.iteration);
                continue;
            }

            if (step.kind === 'ran') scratch.stagesRun.push(label);
            else scratch.skipped.push(label);
            label = successor(label, this.config, request.iteration);
        }

        setCorrelation({ stage: '' });
        return {
            kind: 'completed',
            stagesRun: scratch.stagesRun,
            skipped: scratch.skipped,
            diagonalization: scratch.diagonalization,
        };
    }

    private async runStep(label: StageLabel, scratch: IterationScratch): Promise<StepResult> {
        const { parallel, complex } = this.config;
        const files = this.files;

        switch (label) {
            case 'secondary-potential':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.potential, flags: { parallel, extra: ['-grr'] } });

            case 'potential':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.potential, flags: { parallel }, requiredInput: files.density });

            case 'force-relabel':
                return this.relabel(scratch.request);

            case 'in1-regeneration':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.in1, flags: {}, requiredInput: files.densitySummary });

            case 'eigen': {
                const decision = this.diagonalization.decide(scratch.request.iteration, {
                    basis: files.hasContent(files.cachedBasis),
                    inverse: files.hasContent(files.cachedInverse),
                });
                scratch.diagonalization = decision;
                return this.invoke({
                    stage: label,
                    program: STAGE_PROGRAMS.eigen,
                    flags: { parallel, complex, extra: decision.flags },
                    requiredInput: files.potential,
                });
            }

            case 'spin-orbit':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.spinOrbit, flags: { parallel, complex }, requiredInput: files.spinOrbitInput });

            case 'density':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.density, flags: this.densityFlags() });

            case 'density-full-zone':
                return this.invoke({
                    stage: label,
                    program: STAGE_PROGRAMS.density,
                    flags: { ...this.densityFlags(), hartreeFock: 'full-zone', kpointSet: 'fbz' },
                    requiredInput: files.fullZoneKpoints,
                });

            case 'hartree-fock':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.hartreeFock, flags: { parallel, complex }, requiredInput: files.hartreeFockInput });

            case 'density-irreducible-zone':
                return this.invoke({
                    stage: label,
                    program: STAGE_PROGRAMS.density,
                    flags: { ...this.densityFlags(), hartreeFock: 'irreducible-zone', kpointSet: 'ibz' },
                    requiredInput: files.irreducibleZoneKpoints,
                });

            case 'eigen-semicore':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.eigen, flags: { parallel, complex, extra: ['-sc'] }, requiredInput: files.semicoreInput });

            case 'density-semicore':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.density, flags: { parallel, complex, extra: ['-sc'] } });

            case 'core':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.core, flags: {}, requiredInput: files.coreInput });

            case 'core-superposition':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.superposition, flags: { extra: ['-super'] } });

            case 'aggregate':
                this.aggregate(scratch);
                return { kind: 'ran' };

            case 'save-previous':
                this.savePrevious();
                return { kind: 'ran' };

            case 'mixer': {
                const step = await this.invoke({ stage: label, program: STAGE_PROGRAMS.mixer, flags: {}, requiredInput: files.mixerInput });
                if (step.kind === 'ran' && files.hasContent(files.mixerSummary)) {
                    this.history.append(this.readSummary(files.mixerSummary));
                }
                return step;
            }

            case 'response-mixer':
                return this.invoke({ stage: label, program: STAGE_PROGRAMS.responseMixer, flags: {}, requiredInput: files.responseMixerInput });
        }
    }

    private densityFlags(): StageFlags {
        const { parallel, complex, spinOrbit, responseMixing } = this.config;
        return { parallel, complex, spinOrbit, response: responseMixing };
    }

    private async invoke(invocation: StageInvocation): Promise<StepResult> {
        const outcome = await this.runner.run(invocation);
        return outcome.status === 'completed' ? { kind: 'ran' } : { kind: 'missing', artifact: outcome.artifact };
    }

    private relabel(request: IterationRequest): StepResult {
        const file = this.files.densityInput(this.config.complex);
        if (!this.files.exists(file)) return { kind: 'skipped' };

        const keyword: DensityKeyword = request.forceRequested && !request.forceConverged ? 'FOR' : 'TOT';
        try {
            if (relabelDensityInput(file, keyword)) {
                this.runLog.note(`${file}: switched to ${keyword}`);
                log.info('density input relabeled', { keyword });
            }
        } catch (e) {
            throw ErrorFactory.filesystem('relabel density input', file, e);
        }
        return { kind: 'ran' };
    }

    private aggregate(scratch: IterationScratch): void {
        const cycle = scratch.request.cycleIndex;
        const parts: string[] = [`\n:ITE${String(cycle).padStart(3, '0')}: ${String(cycle).padStart(3)}. ITERATION`];
        const seen = new Set<string>();

        for (const [stage, suffix] of STAGE_SUMMARIES) {
            const file = this.files.path(suffix);
            if (!scratch.stagesRun.includes(stage) || seen.has(file) || !this.files.hasContent(file)) continue;
            seen.add(file);
            parts.push(this.readSummary(file).trimEnd());
        }

        this.history.append(parts.join('\n'));
    }

    private readSummary(file: string): string {
        try {
            return fs.readFileSync(file, 'utf-8');
        } catch (e) {
            throw ErrorFactory.filesystem('read stage summary', file, e);
        }
    }

    private savePrevious(): void {
        const pairs: [string, string][] = [
            [this.files.density, this.files.densityPrevious],
            [this.files.potential, this.files.potentialPrevious],
        ];
        for (const [from, to] of pairs) {
            if (!this.files.exists(from)) continue;
            try {
                fs.copyFileSync(from, to);
            } catch (e) {
                throw ErrorFactory.filesystem('save previous cycle', from, e);
            }
        }
    }
}
