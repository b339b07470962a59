/**
 * Adaptive minimization mode switch.
 *
 * While the mixer runs its adaptive variant (MSR1a, which relaxes atomic
 * positions together with the density), each iteration yields a readiness
 * observation. Three consecutive ready observations demote the mixer to its
 * fixed-step sibling: the input is rewritten, mixing history is purged and
 * the step size is halved down to a floor. Demotion is one-way for the run.
 */

import { MINIMIZATION } from './config';
import { createLogger } from './logger';
import type { MixerInput, MixingHistory } from './mixing_files';
import type { MinimizationModeState } from './scf_types';

const log = createLogger('mode-switch');

export interface ModeSwitchSnapshot {
    /** The mode's own signal: RMS force below the ready threshold. */
    nativeReady: boolean;
    /** One-off checks against fixed tight thresholds, independent of the run's criteria. */
    tightEnergyConverged: boolean;
    tightChargeConverged: boolean;
    lastStepMetric: number | null;
}

export type ModeSwitchAction = 'none' | 'demote';

export interface ModeSwitchOptions {
    active: boolean;
    mixerInput: Pick<MixerInput, 'rewrite' | 'stepSize'>;
    mixingHistory: Pick<MixingHistory, 'purge'>;
    saturation?: number;
    stepFloor?: number;
}

export function computeStepSize(lastStepMetric: number, floor: number = MINIMIZATION.STEP_SIZE_FLOOR): number {
    return Math.max(lastStepMetric / 2, floor);
}

/** Either tight check failing overrides the native signal. */
export function isReady(snapshot: ModeSwitchSnapshot): boolean {
    return snapshot.nativeReady && snapshot.tightEnergyConverged && snapshot.tightChargeConverged;
}

export class MinimizationModeSwitch {
    private readonly current: MinimizationModeState;
    private readonly saturation: number;
    private readonly stepFloor: number;
    private readonly mixerInput: Pick<MixerInput, 'rewrite' | 'stepSize'>;
    private readonly mixingHistory: Pick<MixingHistory, 'purge'>;

    constructor(options: ModeSwitchOptions) {
        this.current = { active: options.active, counter: 0, stepSize: null };
        this.saturation = options.saturation ?? MINIMIZATION.HYSTERESIS_SATURATION;
        this.stepFloor = options.stepFloor ?? MINIMIZATION.STEP_SIZE_FLOOR;
        this.mixerInput = options.mixerInput;
        this.mixingHistory = options.mixingHistory;
    }

    get state(): Readonly<MinimizationModeState> {
        return this.current;
    }

    get active(): boolean {
        return this.current.active;
    }

    observe(snapshot: ModeSwitchSnapshot): ModeSwitchAction {
        if (!this.current.active) return 'none';

        if (!isReady(snapshot)) {
            if (this.current.counter > 0) {
                log.debug('readiness lost, counter reset', { counter: this.current.counter, ...snapshot });
            }
            this.current.counter = 0;
            return 'none';
        }

        this.current.counter = Math.min(this.current.counter + 1, this.saturation);
        log.info('ready for fixed-step mixing', { counter: this.current.counter, saturation: this.saturation });

        if (this.current.counter < this.saturation) return 'none';

        this.demote(snapshot.lastStepMetric, 'hysteresis saturated');
        return 'demote';
    }

    /**
     * Switch to the fixed-step variant now. Also used for the operator's abort
     * signal. Without a step metric in the history the current step size of the
     * mixer input is halved instead. Returns the new step size, or null when
     * already demoted.
     */
    demote(lastStepMetric: number | null, reason: string): number | null {
        if (!this.current.active) return null;

        const base = lastStepMetric ?? this.mixerInput.stepSize() ?? this.stepFloor;
        const stepSize = computeStepSize(base, this.stepFloor);

        this.mixerInput.rewrite(MINIMIZATION.FIXED_STEP_VARIANT, stepSize);
        this.mixingHistory.purge();

        this.current.active = false;
        this.current.stepSize = stepSize;
        log.info(`${MINIMIZATION.ADAPTIVE_VARIANT} demoted to ${MINIMIZATION.FIXED_STEP_VARIANT}`, { reason, step_size: stepSize });
        return stepSize;
    }
}
