/**
 * Command-line options for scfctl.
 *
 * Parsing is pure: it never touches the case directory. Anything that
 * depends on files (complex arithmetic, adaptive mixing) is detected when the
 * run is assembled.
 */

import * as path from 'path';
import { CYCLE_DEFAULTS, DIAGONALIZATION_DEFAULTS, STAGE_LAUNCHER } from './config';
import type { CriteriaThresholds } from './cycle_controller';
import type { DiagonalizationConfig } from './diagonalization_state';
import type { Result, StageLabel } from './scf_types';
import { isStageLabel, PIPELINE_ORDER, type PipelineConfig } from './stage_pipeline';

export interface ScfOptions {
    help: boolean;
    caseName: string;
    dir: string;
    criteria: CriteriaThresholds;
    maxIterations: number;
    restartInterval: number;
    pipeline: Omit<PipelineConfig, 'complex'>;
    diagonalization: DiagonalizationConfig;
    /** Unset: chosen from the case files when the run is assembled. */
    startAt?: StageLabel;
    keepHistory: boolean;
    atomCount?: number;
    readyThreshold?: number;
    testconv?: string;
    launcher: string;
    ledgerPath?: string;
    /** The arguments as given, for the run log header. */
    summary: string[];
}

const VALUE_OPTIONS = [
    '--case', '--dir', '--energy', '--charge', '--force',
    '--max-iterations', '--restart-interval', '--full-diag-period', '--in1-every',
    '--start', '--atoms', '--ready-threshold', '--testconv', '--launcher', '--ledger',
] as const;

const FLAG_OPTIONS = [
    '--parallel', '--spin-orbit', '--hartree-fock', '--response-mixing', '--superpose-core',
    '--secondary-potential', '--iterative', '--no-inverse-cache', '--pratt', '--keep-history', '--help',
] as const;

type ValueOption = typeof VALUE_OPTIONS[number];
type FlagOption = typeof FLAG_OPTIONS[number];

function isValueOption(arg: string): arg is ValueOption {
    return VALUE_OPTIONS.some(option => option === arg);
}

function isFlagOption(arg: string): arg is FlagOption {
    return FLAG_OPTIONS.some(option => option === arg);
}

type NumberKind = 'positive' | 'count' | 'non-negative-int';

function readNumber(
    values: Map<ValueOption, string>,
    name: ValueOption,
    kind: NumberKind,
    errors: string[]
): number | undefined {
    const raw = values.get(name);
    if (raw === undefined) return undefined;
    const value = Number(raw);
    const valid =
        kind === 'positive' ? Number.isFinite(value) && value > 0 :
        kind === 'count' ? Number.isInteger(value) && value >= 1 :
        Number.isInteger(value) && value >= 0;
    if (!valid) {
        const expected = kind === 'positive' ? 'a positive number' : kind === 'count' ? 'an integer >= 1' : 'an integer >= 0';
        errors.push(`${name} expects ${expected}, got "${raw}"`);
        return undefined;
    }
    return value;
}

export function parseOptions(args: string[], cwd: string = process.cwd()): Result<ScfOptions> {
    const values = new Map<ValueOption, string>();
    const flags = new Set<FlagOption>();
    const errors: string[] = [];

    for (let i = 0; i < args.length; i++) {
        const arg = args[i];
        if (arg === '-h') {
            flags.add('--help');
        } else if (isFlagOption(arg)) {
            flags.add(arg);
        } else if (isValueOption(arg)) {
            const value = args[i + 1];
            if (value === undefined || value.startsWith('--')) {
                errors.push(`${arg} requires a value`);
                continue;
            }
            values.set(arg, value);
            i++;
        } else {
            errors.push(`unknown option: ${arg}`);
        }
    }

    const dir = path.resolve(cwd, values.get('--dir') ?? '.');
    const caseName = values.get('--case') ?? path.basename(dir);

    const criteria: CriteriaThresholds = {
        energy: readNumber(values, '--energy', 'positive', errors),
        charge: readNumber(values, '--charge', 'positive', errors),
        force: readNumber(values, '--force', 'positive', errors),
    };
    if (!values.has('--energy') && !values.has('--charge') && !values.has('--force')) {
        criteria.energy = CYCLE_DEFAULTS.ENERGY_THRESHOLD;
    }

    const maxIterations = readNumber(values, '--max-iterations', 'count', errors) ?? CYCLE_DEFAULTS.MAX_ITERATIONS;
    const restartInterval = readNumber(values, '--restart-interval', 'count', errors) ?? CYCLE_DEFAULTS.RESTART_INTERVAL;
    const rebuildPeriod = readNumber(values, '--full-diag-period', 'non-negative-int', errors) ?? DIAGONALIZATION_DEFAULTS.REBUILD_PERIOD;
    const in1Every = readNumber(values, '--in1-every', 'non-negative-int', errors) ?? 0;
    const atomCount = readNumber(values, '--atoms', 'count', errors);
    const readyThreshold = readNumber(values, '--ready-threshold', 'positive', errors);

    const startRaw = values.get('--start');
    let startAt: StageLabel | undefined;
    if (startRaw !== undefined) {
        if (isStageLabel(startRaw)) startAt = startRaw;
        else errors.push(`--start expects one of: ${PIPELINE_ORDER.join(', ')}; got "${startRaw}"`);
    }

    if ((flags.has('--no-inverse-cache') || flags.has('--pratt') || values.has('--full-diag-period')) && !flags.has('--iterative')) {
        errors.push('--full-diag-period, --no-inverse-cache and --pratt require --iterative');
    }

    if (errors.length > 0) {
        return { ok: false, error: 'INVALID_OPTIONS', message: errors.join('; ') };
    }

    return {
        ok: true,
        value: {
            help: flags.has('--help'),
            caseName,
            dir,
            criteria,
            maxIterations,
            restartInterval,
            pipeline: {
                parallel: flags.has('--parallel'),
                spinOrbit: flags.has('--spin-orbit'),
                hartreeFock: flags.has('--hartree-fock'),
                secondaryPotential: flags.has('--secondary-potential'),
                coreSuperposition: flags.has('--superpose-core'),
                responseMixing: flags.has('--response-mixing'),
                in1Every,
            },
            diagonalization: {
                enabled: flags.has('--iterative'),
                rebuildPeriod,
                noInverseCache: flags.has('--no-inverse-cache'),
                extrapolation: flags.has('--pratt') ? 'pratt' : 'carry-forward',
            },
            startAt,
            keepHistory: flags.has('--keep-history'),
            atomCount,
            readyThreshold,
            testconv: values.get('--testconv'),
            launcher: values.get('--launcher') ?? STAGE_LAUNCHER,
            ledgerPath: values.get('--ledger'),
            summary: [...args],
        },
    };
}

export const USAGE = `scfctl - drive the self-consistent-field cycle of a case directory

Usage: scfctl [options]

Case:
  --case <name>             Case name (default: base name of --dir)
  --dir <path>              Case directory (default: current directory)
  --start <stage>           Stage to start the first iteration at (default: from the case files)
  --keep-history            Keep mixing history from a previous run

Convergence (energy ${CYCLE_DEFAULTS.ENERGY_THRESHOLD} when none is given):
  --energy <thr>            Total energy change between iterations (Ry)
  --charge <thr>            Charge distance
  --force <thr>             Force change per atomic site (mRy/bohr)
  --atoms <n>               Number of sites to check for forces (default: from history)
  --testconv <cmd>          External comparison tool (default: in-process)

Cycle:
  --max-iterations <n>      Iteration budget (default ${CYCLE_DEFAULTS.MAX_ITERATIONS})
  --restart-interval <n>    Purge mixing history every n iterations (default ${CYCLE_DEFAULTS.RESTART_INTERVAL})
  --ready-threshold <v>     RMS force for adaptive minimization readiness

Stages:
  --parallel                Parallel stage variants (-p)
  --spin-orbit              Include the spin-orbit stage
  --hartree-fock            Hybrid/Hartree-Fock density passes
  --response-mixing         Mix the response potential as well
  --superpose-core          Superpose core density after the core stage
  --secondary-potential     Run an extra gradient potential pass first
  --in1-every <n>           Regenerate the eigen input every n iterations
  --launcher <cmd>          Prefix for every stage program (e.g. "x")

Iterative diagonalization:
  --iterative               Reuse the eigenbasis between iterations
  --full-diag-period <n>    Diagonalize from scratch every n iterations
  --no-inverse-cache        Run without the cached inverse operator
  --pratt                   Pratt extrapolation of the cached basis

Audit:
  --ledger <path>           Record the run in a SQLite ledger

Control files in the case directory, polled between iterations:
  .stop  .fulldiag  .noHinv  .minstop
`;
