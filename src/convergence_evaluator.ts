/**
 * Convergence evaluation against the cumulative SCF history.
 *
 * Two implementations share one contract:
 * - ExternalConvergenceEvaluator shells out to a comparison tool
 *   (`<tool> <tag> <threshold> <history>`), which prints `1` or `0` on its
 *   first line followed by the recent deltas.
 * - HistoryConvergenceEvaluator reads the history in process.
 */

import * as path from 'path';
import { type CommandExecutor, execaExecutor, splitCommand } from './command_executor';
import { ErrorFactory } from './structured_error';
import { ScfHistory, forceTag, parseNumbers } from './scf_history';
import { HISTORY_TAGS } from './config';
import type { ForceSiteVerdict } from './scf_types';
import { createLogger } from './logger';

const log = createLogger('convergence');

export interface ConvergenceVerdict {
    quantity: string;
    converged: boolean;
    lastDeltas: number[];
}

export interface ConvergenceEvaluator {
    evaluate(quantityTag: string, historyFile: string, threshold: number): Promise<ConvergenceVerdict>;
}

/* -------------------------------------------------------------------------- */
/* In-process comparison                                                      */
/* -------------------------------------------------------------------------- */

export type ComparisonMode = 'difference' | 'value';

export interface QuantityRule {
    mode: ComparisonMode;
    components: number;
}

/**
 * Charge distance is already a change measure, so its latest value is
 * compared directly. Energies and forces are compared between the last two
 * iterations; forces carry three Cartesian components.
 */
export function ruleFor(tag: string): QuantityRule {
    if (tag === HISTORY_TAGS.CHARGE) return { mode: 'value', components: 1 };
    if (tag.startsWith(HISTORY_TAGS.FORCE_PREFIX)) return { mode: 'difference', components: 3 };
    return { mode: 'difference', components: 1 };
}

export class HistoryConvergenceEvaluator implements ConvergenceEvaluator {
    async evaluate(quantityTag: string, historyFile: string, threshold: number): Promise<ConvergenceVerdict> {
        const rule = ruleFor(quantityTag);
        const occurrences = new ScfHistory(historyFile)
            .valuesFor(quantityTag)
            .map(values => values.slice(-rule.components))
            .filter(values => values.length === rule.components);

        if (rule.mode === 'value') {
            if (occurrences.length === 0) return { quantity: quantityTag, converged: false, lastDeltas: [] };
            const last = occurrences[occurrences.length - 1];
            return {
                quantity: quantityTag,
                converged: last.every(v => Math.abs(v) <= threshold),
                lastDeltas: last,
            };
        }

        if (occurrences.length < 2) {
            return { quantity: quantityTag, converged: false, lastDeltas: [] };
        }
        const prev = occurrences[occurrences.length - 2];
        const last = occurrences[occurrences.length - 1];
        const deltas = last.map((v, i) => Math.abs(v - prev[i]));
        return {
            quantity: quantityTag,
            converged: deltas.every(d => d <= threshold),
            lastDeltas: deltas,
        };
    }
}

/* -------------------------------------------------------------------------- */
/* External comparison tool                                                   */
/* -------------------------------------------------------------------------- */

export class ExternalConvergenceEvaluator implements ConvergenceEvaluator {
    private readonly argv: string[];

    constructor(command: string, private readonly executor: CommandExecutor = execaExecutor) {
        this.argv = splitCommand(command);
        if (this.argv.length === 0) throw new Error('comparison tool command is empty');
    }

    async evaluate(quantityTag: string, historyFile: string, threshold: number): Promise<ConvergenceVerdict> {
        const [file, ...prefix] = this.argv;
        const result = await this.executor(file, [...prefix, quantityTag, String(threshold), historyFile], {
            cwd: path.dirname(historyFile),
        });
        if (result.exitCode !== 0) {
            throw ErrorFactory.comparisonFailed(quantityTag, result.exitCode, result.output);
        }

        const [head, ...rest] = result.output.trim().split(/\r?\n/);
        const flag = (head ?? '').trim();
        if (flag !== '0' && flag !== '1') {
            throw ErrorFactory.comparisonFailed(quantityTag, result.exitCode, result.output);
        }
        return {
            quantity: quantityTag,
            converged: flag === '1',
            lastDeltas: parseNumbers(rest.join(' ')),
        };
    }
}

/* -------------------------------------------------------------------------- */
/* Force reduction                                                            */
/* -------------------------------------------------------------------------- */

/** Logical AND over sites; no sites means nothing could be verified. */
export function reduceForceVerdicts(converged: boolean[]): boolean {
    return converged.length > 0 && converged.every(c => c);
}

export interface ForceEvaluation {
    converged: boolean;
    sites: ForceSiteVerdict[];
}

export async function evaluateForces(
    evaluator: ConvergenceEvaluator,
    history: ScfHistory,
    threshold: number,
    atomCount?: number
): Promise<ForceEvaluation> {
    const siteNumbers = atomCount !== undefined
        ? Array.from({ length: atomCount }, (_, i) => i + 1)
        : history.forceSites();

    // Every site is evaluated even after one fails, so the deltas can be reported
    const sites: ForceSiteVerdict[] = [];
    for (const site of siteNumbers) {
        const verdict = await evaluator.evaluate(forceTag(site), history.file, threshold);
        sites.push({ site, converged: verdict.converged, deltas: verdict.lastDeltas });
    }

    const converged = reduceForceVerdicts(sites.map(s => s.converged));
    log.debug('force criterion evaluated', { sites: sites.length, converged });
    return { converged, sites };
}
