/**
 * Artifact naming for a case directory. Every stage reads and writes
 * `<case>.<suffix>` files next to each other; the controller only needs to
 * know the names it checks, moves or rewrites.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ErrorFactory, errnoCode } from './structured_error';

export class CaseFiles {
    constructor(public readonly dir: string, public readonly caseName: string) { }

    path(suffix: string): string {
        return path.join(this.dir, `${this.caseName}.${suffix}`);
    }

    /** Present and non-empty. */
    hasContent(file: string): boolean {
        try {
            return fs.statSync(file).size > 0;
        } catch {
            return false;
        }
    }

    exists(file: string): boolean {
        return fs.existsSync(file);
    }

    // Potential / density
    get density(): string { return this.path('clmsum'); }
    get densityPrevious(): string { return this.path('clmsum_old'); }
    get potential(): string { return this.path('vsp'); }
    get potentialPrevious(): string { return this.path('vsp_old'); }

    // Stage inputs
    get complexMarker(): string { return this.path('in1c'); }
    get spinOrbitInput(): string { return this.path('inso'); }
    get semicoreInput(): string { return this.path('in1s'); }
    get coreInput(): string { return this.path('inc'); }
    get hartreeFockInput(): string { return this.path('inhf'); }
    get fullZoneKpoints(): string { return this.path('klist_fbz'); }
    get irreducibleZoneKpoints(): string { return this.path('klist_ibz'); }
    get mixerInput(): string { return this.path('inm'); }
    get responseMixerInput(): string { return this.path('inm_vresp'); }

    densityInput(complex: boolean): string {
        return this.path(complex ? 'in2c' : 'in2');
    }

    // Eigenvector / inverse-operator cache left by the eigen stage
    get cachedBasis(): string { return this.path('vector_old'); }
    get cachedInverse(): string { return this.path('storeHinv'); }

    // Summaries and logs
    get history(): string { return this.path('scf'); }
    get runLog(): string { return this.path('dayfile'); }
    get mixerSummary(): string { return this.path('scfm'); }
    get densitySummary(): string { return this.path('scf2'); }

    /** Mixing history files (`<case>.broyd1`, `<case>.broyd2`, ...). */
    mixingHistoryFiles(): string[] {
        const prefix = `${this.caseName}.broyd`;
        let entries: string[];
        try {
            entries = fs.readdirSync(this.dir);
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return [];
            throw ErrorFactory.filesystem('list mixing history', this.dir, e);
        }
        return entries
            .filter(name => name.startsWith(prefix))
            .sort()
            .map(name => path.join(this.dir, name));
    }
}
