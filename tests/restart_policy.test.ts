import test from 'node:test';
import assert from 'node:assert/strict';

import { RestartPolicy, completeIteration } from '../src/restart_policy';
import type { IterationState } from '../src/scf_types';

function fakeHistory(initiallyPresent: boolean) {
    let present = initiallyPresent;
    let purges = 0;
    return {
        exists: () => present,
        purge: () => {
            purges++;
            present = false;
            return ['case.broyd1'];
        },
        setPresent: (value: boolean) => {
            present = value;
        },
        purges: () => purges,
    };
}

function start(restartInterval: number): IterationState {
    return { iteration: 0, remaining: 40, restartCountdown: restartInterval, cycleIndex: 0 };
}

test('completeIteration decrements the budget and the countdown once', () => {
    assert.deepEqual(completeIteration({ iteration: 3, remaining: 10, restartCountdown: 2, cycleIndex: 7 }), {
        iteration: 3,
        remaining: 9,
        restartCountdown: 1,
        cycleIndex: 7,
    });
});

test('interval 5 with history present restarts at iteration 5 and re-arms', () => {
    const history = fakeHistory(true);
    const policy = new RestartPolicy(5, history);
    let state = start(5);
    const firedAt: number[] = [];

    for (let i = 1; i <= 7; i++) {
        history.setPresent(true);
        state = completeIteration({ ...state, iteration: i });
        const evaluation = policy.evaluate(state);
        if (evaluation.fired) firedAt.push(i);
        state = evaluation.state;
    }

    assert.deepEqual(firedAt, [5]);
    assert.equal(state.restartCountdown, 3);
    assert.equal(state.remaining, 33);
    assert.equal(history.purges(), 1);
});

test('without history the restart waits until history exists', () => {
    const history = fakeHistory(false);
    const policy = new RestartPolicy(5, history);
    let state = start(5);
    const firedAt: number[] = [];

    for (let i = 1; i <= 7; i++) {
        if (i === 7) history.setPresent(true);
        state = completeIteration({ ...state, iteration: i });
        const evaluation = policy.evaluate(state);
        if (evaluation.fired) {
            firedAt.push(i);
            assert.deepEqual(evaluation.purged, ['case.broyd1']);
        }
        state = evaluation.state;
    }

    assert.deepEqual(firedAt, [7]);
    assert.equal(state.restartCountdown, 5);
});

test('a countdown above zero never fires', () => {
    const history = fakeHistory(true);
    const evaluation = new RestartPolicy(5, history).evaluate({ iteration: 1, remaining: 39, restartCountdown: 4, cycleIndex: 1 });
    assert.equal(evaluation.fired, false);
    assert.equal(history.purges(), 0);
});
