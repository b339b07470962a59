/**
 * The density-mixing stage's on-disk state: accumulated mixing history
 * (`<case>.broyd*`) and the mixer input (`<case>.inm`), whose first line
 * names the algorithm variant and whose second line starts with the step size.
 */

import * as fs from 'fs';
import { atomicWriteFileSync } from './atomic_write';
import type { CaseFiles } from './case_files';
import { createLogger } from './logger';
import { ErrorFactory, errnoCode } from './structured_error';

const log = createLogger('mixing');

export class MixingHistory {
    constructor(private readonly files: CaseFiles) { }

    exists(): boolean {
        return this.files.mixingHistoryFiles().length > 0;
    }

    /** Removes every history file; returns the removed paths. */
    purge(): string[] {
        const removed: string[] = [];
        for (const file of this.files.mixingHistoryFiles()) {
            try {
                fs.unlinkSync(file);
                removed.push(file);
            } catch (e) {
                if (errnoCode(e) !== 'ENOENT') {
                    throw ErrorFactory.filesystem('purge mixing history', file, e);
                }
            }
        }
        if (removed.length > 0) log.info('mixing history purged', { files: removed.length });
        return removed;
    }
}

export class MixerInput {
    constructor(public readonly file: string) { }

    private readLines(): string[] | null {
        try {
            return fs.readFileSync(this.file, 'utf-8').split('\n');
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return null;
            throw ErrorFactory.filesystem('read mixer input', this.file, e);
        }
    }

    variant(): string | null {
        const lines = this.readLines();
        if (!lines) return null;
        const first = lines[0].trim().split(/\s+/)[0];
        return first ? first : null;
    }

    stepSize(): number | null {
        const lines = this.readLines();
        if (!lines || lines.length < 2) return null;
        const value = Number(lines[1].trim().split(/\s+/)[0]);
        return Number.isFinite(value) ? value : null;
    }

    /** Replace the variant on line 1 and the step size on line 2, keeping the trailing comments. */
    rewrite(variant: string, stepSize: number): void {
        const lines = this.readLines();
        if (!lines || lines.length < 2) {
            throw ErrorFactory.filesystem('rewrite mixer input', this.file, new Error('expected at least two lines'));
        }
        lines[0] = replaceLeadingToken(lines[0], variant);
        lines[1] = replaceLeadingToken(lines[1], stepSize.toFixed(3));
        try {
            atomicWriteFileSync({ filePath: this.file, content: lines.join('\n') });
        } catch (e) {
            throw ErrorFactory.filesystem('rewrite mixer input', this.file, e);
        }
    }
}

/** Replace the first whitespace-delimited token, padding so later columns stay put when possible. */
export function replaceLeadingToken(line: string, token: string): string {
    const m = line.match(/^(\s*)(\S+)(.*)$/);
    if (!m) return token;
    const [, lead, old, rest] = m;
    const padded = token.length < old.length ? token.padEnd(old.length) : token;
    const tail = padded.length > old.length && rest.length > 0 && !/^\s/.test(rest) ? ` ${rest}` : rest;
    return `${lead}${padded}${tail}`;
}
