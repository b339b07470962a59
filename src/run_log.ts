/**
 * Run summary artifact (`<case>.dayfile`): append-only audit trail of a run.
 * Stage headers and output, per-iteration convergence verdicts and the final
 * message of every terminal path land here.
 */

import * as fs from 'fs';
import type { ConvergenceFlags, CriterionName, ForceSiteVerdict } from './scf_types';
import { ErrorFactory } from './structured_error';

export interface CriterionReport {
    name: CriterionName;
    threshold: number;
    converged: boolean;
    deltas: number[];
    sites?: ForceSiteVerdict[];
}

function clock(): string {
    return new Date().toTimeString().slice(0, 8);
}

function formatDeltas(deltas: number[]): string {
    return deltas.length > 0 ? deltas.map(d => d.toExponential(3)).join(' ') : '-';
}

export class RunLog {
    constructor(public readonly file: string) { }

    append(text: string): void {
        try {
            fs.appendFileSync(this.file, text.endsWith('\n') ? text : text + '\n');
        } catch (e) {
            throw ErrorFactory.filesystem('append run log', this.file, e);
        }
    }

    runHeader(caseName: string, workDir: string, runId: string, options: string[]): void {
        this.append(`\nCalculating ${caseName} in ${workDir}`);
        this.append(`run ${runId} started ${new Date().toISOString()}`);
        this.append(`options: ${options.join(' ') || '(defaults)'}`);
    }

    cycleHeader(cycleIndex: number, remaining: number, maxIterations: number): void {
        this.append(`\n    cycle ${cycleIndex} \t(${new Date().toUTCString()}) \t(${remaining}/${maxIterations} to go)`);
    }

    stageHeader(program: string, args: string[]): void {
        this.append(`>   ${[program, ...args].join(' ')}\t(${clock()})`);
    }

    stageOutput(output: string): void {
        const trimmed = output.trimEnd();
        if (trimmed.length > 0) this.append(trimmed);
    }

    note(message: string): void {
        this.append(`>   ${message}`);
    }

    verdicts(reports: CriterionReport[], flags: ConvergenceFlags): void {
        for (const report of reports) {
            const label = `:${report.name.toUpperCase()} convergence:`;
            this.append(`${label.padEnd(22)} ${report.converged ? 1 : 0}  ${report.threshold}  ${formatDeltas(report.deltas)}`);
            for (const site of report.sites ?? []) {
                this.append(`    site ${String(site.site).padStart(3)}: ${site.converged ? 1 : 0}  ${formatDeltas(site.deltas)}`);
            }
        }
        this.append(`ec cc and fc_conv ${this.flagDigit(flags.energy)} ${this.flagDigit(flags.charge)} ${this.flagDigit(flags.force)}`);
    }

    final(message: string): void {
        this.append(`\n>   ${message}  (${new Date().toISOString()})`);
    }

    private flagDigit(status: ConvergenceFlags[CriterionName]): string {
        return status === 'converged' ? '1' : status === 'pending' ? '0' : '-';
    }
}
