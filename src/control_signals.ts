/**
 * Operator control signals, polled at iteration boundaries.
 *
 * The file channel keeps the presence-of-file contract (`touch .stop` in the
 * case directory); the memory channel serves embedding and tests. Each
 * observation has at most one effect: `consume` reports presence and clears
 * the signal in one step.
 */

import * as fs from 'fs';
import * as path from 'path';
import { SIGNAL_FILES } from './config';
import { createLogger } from './logger';
import type { ControlSignal } from './scf_types';
import { ErrorFactory, errnoCode } from './structured_error';

const log = createLogger('signals');

export interface ControlChannel {
    isRaised(signal: ControlSignal): boolean;
    /** True when the signal was raised; it is cleared before returning. */
    consume(signal: ControlSignal): boolean;
}

export class FileControlChannel implements ControlChannel {
    constructor(
        private readonly dir: string,
        private readonly names: Record<ControlSignal, string> = SIGNAL_FILES
    ) { }

    fileFor(signal: ControlSignal): string {
        return path.join(this.dir, this.names[signal]);
    }

    isRaised(signal: ControlSignal): boolean {
        return fs.existsSync(this.fileFor(signal));
    }

    consume(signal: ControlSignal): boolean {
        const file = this.fileFor(signal);
        try {
            fs.unlinkSync(file);
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return false;
            throw ErrorFactory.filesystem('consume control signal', file, e);
        }
        log.info(`control signal consumed`, { signal, file });
        return true;
    }
}

export class MemoryControlChannel implements ControlChannel {
    private readonly raised = new Set<ControlSignal>();

    raise(signal: ControlSignal): void {
        this.raised.add(signal);
    }

    isRaised(signal: ControlSignal): boolean {
        return this.raised.has(signal);
    }

    consume(signal: ControlSignal): boolean {
        return this.raised.delete(signal);
    }
}
