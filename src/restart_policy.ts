/**
 * Restart Policy: stagnation recovery for the mixing stage.
 *
 * Every completed iteration counts the restart countdown down. When it runs
 * out and mixing history exists, the history is purged so the mixer starts
 * over from plain linear mixing, and the countdown is re-armed. This answers
 * oscillating mixing, not faults; faults end the run.
 */

import { createLogger } from './logger';
import type { MixingHistory } from './mixing_files';
import type { IterationState } from './scf_types';

const log = createLogger('restart');

export interface RestartEvaluation {
    fired: boolean;
    purged: string[];
    state: IterationState;
}

/** Decrement the iteration budget and the restart countdown for one completed iteration. */
export function completeIteration(state: IterationState): IterationState {
    return {
        ...state,
        remaining: state.remaining - 1,
        restartCountdown: state.restartCountdown - 1,
    };
}

export class RestartPolicy {
    constructor(
        private readonly restartInterval: number,
        private readonly mixingHistory: Pick<MixingHistory, 'exists' | 'purge'>
    ) { }

    /**
     * Apply the policy to a state whose countdown was already decremented for
     * the iteration. A countdown at or below zero keeps waiting for history to
     * appear, so a restart is never skipped for good.
     */
    evaluate(state: IterationState): RestartEvaluation {
        if (state.restartCountdown > 0 || !this.mixingHistory.exists()) {
            return { fired: false, purged: [], state };
        }

        const purged = this.mixingHistory.purge();
        log.info('restart: mixing history purged', { iteration: state.iteration, files: purged.length });
        return {
            fired: true,
            purged,
            state: { ...state, restartCountdown: this.restartInterval },
        };
    }
}
