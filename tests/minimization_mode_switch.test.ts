import test from 'node:test';
import assert from 'node:assert/strict';

import {
    MinimizationModeSwitch,
    computeStepSize,
    isReady,
    type ModeSwitchAction,
    type ModeSwitchSnapshot,
} from '../src/minimization_mode_switch';

const READY: ModeSwitchSnapshot = {
    nativeReady: true,
    tightEnergyConverged: true,
    tightChargeConverged: true,
    lastStepMetric: 0.2,
};
const NOT_READY: ModeSwitchSnapshot = { ...READY, nativeReady: false };

function harness(active = true, currentStep: number | null = 0.3) {
    const rewrites: [string, number][] = [];
    let purges = 0;
    const modeSwitch = new MinimizationModeSwitch({
        active,
        mixerInput: {
            rewrite: (variant: string, stepSize: number) => {
                rewrites.push([variant, stepSize]);
            },
            stepSize: () => currentStep,
        },
        mixingHistory: {
            purge: () => {
                purges++;
                return [];
            },
        },
    });
    return { modeSwitch, rewrites, purges: () => purges };
}

test('step size is half the last step metric with a floor of 0.05', () => {
    assert.equal(computeStepSize(0.03), 0.05);
    assert.equal(computeStepSize(0.2), 0.1);
});

test('either tight check failing overrides native readiness', () => {
    assert.equal(isReady(READY), true);
    assert.equal(isReady({ ...READY, tightEnergyConverged: false }), false);
    assert.equal(isReady({ ...READY, tightChargeConverged: false }), false);
    assert.equal(isReady(NOT_READY), false);
});

test('demotion happens on the third consecutive ready observation and never again', () => {
    const { modeSwitch, rewrites, purges } = harness();
    const sequence = [READY, READY, NOT_READY, READY, READY, READY];

    const actions: ModeSwitchAction[] = sequence.map(snapshot => modeSwitch.observe(snapshot));

    assert.deepEqual(actions, ['none', 'none', 'none', 'none', 'none', 'demote']);
    assert.deepEqual(rewrites, [['MSR1', 0.1]]);
    assert.equal(purges(), 1);
    assert.deepEqual(modeSwitch.state, { active: false, counter: 3, stepSize: 0.1 });

    assert.equal(modeSwitch.observe(READY), 'none');
    assert.equal(modeSwitch.observe(READY), 'none');
    assert.equal(modeSwitch.observe(READY), 'none');
    assert.equal(rewrites.length, 1);
});

test('a tight-check failure resets the counter', () => {
    const { modeSwitch } = harness();
    modeSwitch.observe(READY);
    modeSwitch.observe(READY);
    assert.equal(modeSwitch.state.counter, 2);

    modeSwitch.observe({ ...READY, tightChargeConverged: false });
    assert.equal(modeSwitch.state.counter, 0);
    assert.equal(modeSwitch.active, true);
});

test('out-of-band demotion falls back to the mixer input step size, then to the floor', () => {
    const fromInput = harness(true, 0.3);
    assert.equal(fromInput.modeSwitch.demote(null, 'operator abort'), 0.15);
    assert.deepEqual(fromInput.rewrites, [['MSR1', 0.15]]);
    assert.equal(fromInput.modeSwitch.demote(0.4, 'operator abort'), null);

    const fromFloor = harness(true, null);
    assert.equal(fromFloor.modeSwitch.demote(null, 'operator abort'), 0.05);
});

test('an inactive switch ignores observations', () => {
    const { modeSwitch, rewrites } = harness(false);
    for (let i = 0; i < 5; i++) assert.equal(modeSwitch.observe(READY), 'none');
    assert.equal(modeSwitch.state.counter, 0);
    assert.deepEqual(rewrites, []);
});
