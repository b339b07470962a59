import test from 'node:test';
import assert from 'node:assert/strict';

import { SqliteRunLedger } from '../src/run_ledger';

test('ledger records runs, phase transitions with a sequence and iterations', () => {
    const ledger = new SqliteRunLedger(':memory:');
    try {
        ledger.startRun({ run_id: 'run-1', case_name: 'si', work_dir: '/cases/si' });
        ledger.recordTransition('run-1', 'init', 'stage-select', 0);
        ledger.recordTransition('run-1', 'stage-select', 'pipeline', 1);
        ledger.recordIteration('run-1', {
            iteration: 1,
            cycle_index: 4,
            diag_mode: 'reuse-cached-basis',
            energy: 'converged',
            charge: 'not-requested',
            force: 'pending',
            restart_fired: true,
            demoted: false,
        });
        ledger.finishRun('run-1', 'converged', 1);

        assert.deepEqual(ledger.listTransitions('run-1'), [
            { from_phase: 'init', to_phase: 'stage-select', iteration: 0, transition_seq: 1 },
            { from_phase: 'stage-select', to_phase: 'pipeline', iteration: 1, transition_seq: 2 },
        ]);
        assert.deepEqual(ledger.listIterations('run-1'), [{
            iteration: 1,
            cycle_index: 4,
            diag_mode: 'reuse-cached-basis',
            energy: 'converged',
            charge: 'not-requested',
            force: 'pending',
            restart_fired: true,
            demoted: false,
        }]);

        const run = ledger.getRun('run-1');
        assert.equal(run?.outcome, 'converged');
        assert.equal(run?.iterations, 1);
        assert.equal(run?.transition_seq, 2);
        assert.notEqual(run?.finished_at, null);
    } finally {
        ledger.close();
    }
});

test('ledger rejects transitions for an unknown run', () => {
    const ledger = new SqliteRunLedger(':memory:');
    try {
        assert.throws(() => ledger.recordTransition('missing', 'init', 'stage-select', 0), /not in ledger/);
        assert.equal(ledger.getRun('missing'), null);
    } finally {
        ledger.close();
    }
});
