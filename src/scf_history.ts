/**
 * Reader for the cumulative SCF summary (`<case>.scf`).
 *
 * Stages write tagged lines such as
 *   :ENE  : ********** TOTAL ENERGY IN Ry =      -1234.56789012
 *   :DIS  :  CHARGE DISTANCE       ( 0.0001234 for atom    1 spin 1)      0.0000567
 *   :FGL001:   1.ATOM        0.120       -0.030        0.000  total forces
 *   :MIX  :   MSR1a  REGULARIZATION:  2.50E-04  GREED:  0.200
 * and the controller reads the latest occurrences back.
 */

import * as fs from 'fs';
import { ErrorFactory, errnoCode } from './structured_error';

// Fortran output may use D exponents
const NUMBER_PATTERN = /[-+]?(?:\d+\.?\d*|\.\d+)(?:[EeDd][-+]?\d+)?/g;
const FORCE_SITE_PATTERN = /^:FGL(\d{3})[\s:]/;

export function parseNumbers(text: string): number[] {
    const matches = text.match(NUMBER_PATTERN) ?? [];
    return matches
        .map(m => Number(m.replace(/[Dd]/, 'E')))
        .filter(n => Number.isFinite(n));
}

export function matchesTag(line: string, tag: string): boolean {
    if (!line.startsWith(tag)) return false;
    const next = line.charAt(tag.length);
    return next === '' || next === ':' || next === ' ' || next === '\t';
}

export function forceTag(site: number): string {
    return `:FGL${String(site).padStart(3, '0')}`;
}

export class ScfHistory {
    constructor(public readonly file: string) { }

    lines(): string[] {
        let text: string;
        try {
            text = fs.readFileSync(this.file, 'utf-8');
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return [];
            throw ErrorFactory.filesystem('read history', this.file, e);
        }
        return text.split(/\r?\n/);
    }

    exists(): boolean {
        return fs.existsSync(this.file);
    }

    /** Numbers after the tag on every occurrence, oldest first. */
    valuesFor(tag: string): number[][] {
        return this.lines()
            .filter(line => matchesTag(line, tag))
            .map(line => parseNumbers(line.slice(tag.length)));
    }

    lastLine(tag: string): string | null {
        const all = this.lines().filter(line => matchesTag(line, tag));
        return all.length > 0 ? all[all.length - 1] : null;
    }

    lastNumber(tag: string): number | null {
        const occurrences = this.valuesFor(tag);
        if (occurrences.length === 0) return null;
        const last = occurrences[occurrences.length - 1];
        return last.length > 0 ? last[last.length - 1] : null;
    }

    /** Number captured by `pattern` (first group) on the last line carrying `tag`. */
    lastCaptured(tag: string, pattern: RegExp): number | null {
        const line = this.lastLine(tag);
        if (!line) return null;
        const m = line.match(pattern);
        if (!m || m[1] === undefined) return null;
        const value = Number(m[1].replace(/[Dd]/, 'E'));
        return Number.isFinite(value) ? value : null;
    }

    /** Distinct atomic sites that reported forces, ascending. */
    forceSites(): number[] {
        const sites = new Set<number>();
        for (const line of this.lines()) {
            const m = line.match(FORCE_SITE_PATTERN);
            if (m) sites.add(Number(m[1]));
        }
        return [...sites].sort((a, b) => a - b);
    }

    append(text: string): void {
        try {
            fs.appendFileSync(this.file, text.endsWith('\n') ? text : text + '\n');
        } catch (e) {
            throw ErrorFactory.filesystem('append history', this.file, e);
        }
    }
}
