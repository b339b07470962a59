/**
 * Iterative diagonalization state.
 *
 * Decides per iteration whether the eigen stage may reuse the cached
 * eigenbasis, must rebuild the cached inverse operator, must work without an
 * inverse cache, or has to diagonalize from scratch. The cache inventory is
 * what the previous iteration left on disk; one-shot operator signals are
 * consumed here.
 */

import type { ControlChannel } from './control_signals';
import { createLogger } from './logger';
import type { BasisExtrapolation, DiagonalizationDecision, DiagonalizationMode } from './scf_types';

const log = createLogger('diag');

export interface CacheInventory {
    basis: boolean;
    inverse: boolean;
}

export interface DiagonalizationConfig {
    enabled: boolean;
    /** Full diagonalization on every multiple of this iteration index; 0 disables. */
    rebuildPeriod: number;
    /** Run without an inverse cache from the first iteration on. */
    noInverseCache: boolean;
    extrapolation: BasisExtrapolation;
}

const MODE_FLAGS: Record<DiagonalizationMode, string[]> = {
    'full': ['-it', '-fd'],
    'reuse-cached-basis': ['-it'],
    'rebuild-cached-inverse': ['-it', '-noHinv'],
    'rebuild-cached-inverse-no-inverse-cache': ['-it', '-noHinv0'],
};

export class IterativeDiagonalizationState {
    constructor(
        private readonly config: DiagonalizationConfig,
        private readonly signals: ControlChannel
    ) { }

    decide(iterationIndex: number, cache: CacheInventory): DiagonalizationDecision {
        if (!this.config.enabled) {
            return { mode: 'full', flags: [] };
        }

        // Both signals are one-shot and consumed on observation, even when the periodic rebuild already applies
        const forced = this.signals.consume('force-full-diagonalization');
        const dropInverse = this.signals.consume('drop-cached-inverse');
        if (dropInverse) log.info('cached inverse dropped for this iteration', { iteration: iterationIndex });

        const periodic = this.config.rebuildPeriod > 0 && iterationIndex % this.config.rebuildPeriod === 0;

        let mode: DiagonalizationMode;
        if (forced || periodic || !cache.basis) {
            mode = 'full';
        } else if (this.config.noInverseCache) {
            mode = 'rebuild-cached-inverse-no-inverse-cache';
        } else if (dropInverse || !cache.inverse) {
            mode = 'rebuild-cached-inverse';
        } else {
            mode = 'reuse-cached-basis';
        }

        if (mode === 'full') {
            log.info('full diagonalization', {
                iteration: iterationIndex,
                reason: forced ? 'signal' : periodic ? 'period' : 'no cached basis',
            });
        }

        const flags = [...MODE_FLAGS[mode]];
        if (this.config.extrapolation === 'pratt') flags.push('-vec2pratt');
        return { mode, flags };
    }
}
