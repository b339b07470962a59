import test from 'node:test';
import assert from 'node:assert/strict';

import { CYCLE_DEFAULTS, STAGE_LAUNCHER } from '../src/config';
import { parseOptions, type ScfOptions } from '../src/options';
import type { Result } from '../src/scf_types';

function parsed(result: Result<ScfOptions>): ScfOptions {
    if (!result.ok) throw new Error(`expected options, got ${result.message ?? result.error}`);
    return result.value;
}

function failure(result: Result<ScfOptions>): string {
    if (result.ok) throw new Error('expected a parse failure');
    assert.equal(result.error, 'INVALID_OPTIONS');
    return result.message ?? '';
}

test('defaults name the case after its directory and check energy only', () => {
    const options = parsed(parseOptions([], '/work/si'));

    assert.equal(options.dir, '/work/si');
    assert.equal(options.caseName, 'si');
    assert.equal(options.criteria.energy, CYCLE_DEFAULTS.ENERGY_THRESHOLD);
    assert.equal(options.criteria.charge, undefined);
    assert.equal(options.criteria.force, undefined);
    assert.equal(options.maxIterations, CYCLE_DEFAULTS.MAX_ITERATIONS);
    assert.equal(options.restartInterval, CYCLE_DEFAULTS.RESTART_INTERVAL);
    assert.equal(options.startAt, undefined);
    assert.equal(options.keepHistory, false);
    assert.equal(options.launcher, STAGE_LAUNCHER);
    assert.equal(options.help, false);
    assert.deepEqual(options.diagonalization, {
        enabled: false,
        rebuildPeriod: 0,
        noInverseCache: false,
        extrapolation: 'carry-forward',
    });
});

test('explicit criteria replace the default energy check', () => {
    const options = parsed(parseOptions(['--charge', '0.001', '--force', '0.5'], '/work/si'));

    assert.equal(options.criteria.energy, undefined);
    assert.equal(options.criteria.charge, 0.001);
    assert.equal(options.criteria.force, 0.5);
});

test('case and directory options resolve against the working directory', () => {
    const options = parsed(parseOptions(['--dir', 'cases/gaas', '--case', 'bulk'], '/work'));

    assert.equal(options.dir, '/work/cases/gaas');
    assert.equal(options.caseName, 'bulk');
});

test('stage switches and counts land in the pipeline configuration', () => {
    const options = parsed(parseOptions(
        ['--parallel', '--spin-orbit', '--hartree-fock', '--in1-every', '3', '--max-iterations', '12', '--keep-history'],
        '/work/si'
    ));

    assert.deepEqual(options.pipeline, {
        parallel: true,
        spinOrbit: true,
        hartreeFock: true,
        secondaryPotential: false,
        coreSuperposition: false,
        responseMixing: false,
        in1Every: 3,
    });
    assert.equal(options.maxIterations, 12);
    assert.equal(options.keepHistory, true);
    assert.deepEqual(options.summary, ['--parallel', '--spin-orbit', '--hartree-fock', '--in1-every', '3', '--max-iterations', '12', '--keep-history']);
});

test('iterative diagonalization options', () => {
    const options = parsed(parseOptions(['--iterative', '--full-diag-period', '5', '--no-inverse-cache', '--pratt'], '/work/si'));

    assert.deepEqual(options.diagonalization, {
        enabled: true,
        rebuildPeriod: 5,
        noInverseCache: true,
        extrapolation: 'pratt',
    });
});

test('diagonalization tuning without --iterative is rejected', () => {
    assert.equal(
        failure(parseOptions(['--pratt'], '/work/si')),
        '--full-diag-period, --no-inverse-cache and --pratt require --iterative'
    );
});

test('start stage must be a pipeline label', () => {
    assert.equal(parsed(parseOptions(['--start', 'mixer'], '/work/si')).startAt, 'mixer');
    assert.match(failure(parseOptions(['--start', 'lapw7'], '/work/si')), /^--start expects one of: secondary-potential, potential, /);
});

test('malformed values are collected into one message', () => {
    assert.equal(
        failure(parseOptions(['--max-iterations', '0', '--energy', 'abc', '--bogus'], '/work/si')),
        'unknown option: --bogus; --energy expects a positive number, got "abc"; --max-iterations expects an integer >= 1, got "0"'
    );
});

test('a value option followed by another option is missing its value', () => {
    assert.equal(failure(parseOptions(['--case', '--parallel'], '/work/si')), '--case requires a value');
});

test('-h asks for help', () => {
    assert.equal(parsed(parseOptions(['-h'], '/work/si')).help, true);
});
