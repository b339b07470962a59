import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';

import { CaseFiles } from '../src/case_files';
import type { CommandExecutor } from '../src/command_executor';
import { RunLog } from '../src/run_log';
import { StageRunner, renderFlags } from '../src/stage_runner';
import { CycleError } from '../src/structured_error';
import { withTmpDir } from './helpers';

interface Call {
    file: string;
    args: string[];
    cwd: string;
}

function recordingExecutor(calls: Call[], exitCode = 0, output = ''): CommandExecutor {
    return async (file, args, options) => {
        calls.push({ file, args, cwd: options.cwd });
        return { exitCode, output };
    };
}

test('renderFlags emits flags in a fixed order followed by extra arguments', () => {
    assert.deepEqual(
        renderFlags({
            parallel: true,
            complex: true,
            spinOrbit: true,
            hartreeFock: 'full-zone',
            kpointSet: 'fbz',
            response: true,
            extra: ['-it', '-fd'],
        }),
        ['-p', '-c', '-so', '-hf', '-fbz', '-vresp', '-it', '-fd']
    );
    assert.deepEqual(renderFlags({}), []);
});

test('a stage with an absent or empty required input is not started', async () => {
    await withTmpDir('stage-runner-', async dir => {
        const files = new CaseFiles(dir, 'case');
        const calls: Call[] = [];
        const runner = new StageRunner({ files, runLog: new RunLog(files.runLog), executor: recordingExecutor(calls) });

        const absent = await runner.run({ stage: 'eigen', program: 'lapw1', flags: {}, requiredInput: files.potential });
        assert.deepEqual(absent, { status: 'missing-input', stage: 'eigen', artifact: files.potential });

        fs.writeFileSync(files.potential, '');
        const empty = await runner.run({ stage: 'eigen', program: 'lapw1', flags: {}, requiredInput: files.potential });
        assert.equal(empty.status, 'missing-input');

        assert.equal(calls.length, 0);
        assert.ok(fs.readFileSync(files.runLog, 'utf-8').includes(`>   eigen: ${files.potential} missing or empty, not started\n`));
    });
});

test('a stage runs behind the launcher in the case directory and its output lands in the run log', async () => {
    await withTmpDir('stage-runner-', async dir => {
        const files = new CaseFiles(dir, 'case');
        fs.writeFileSync(files.potential, 'v');
        const calls: Call[] = [];
        const runner = new StageRunner({
            files,
            runLog: new RunLog(files.runLog),
            executor: recordingExecutor(calls, 0, 'LAPW1 END\n'),
            launcher: 'x',
        });

        const outcome = await runner.run({
            stage: 'eigen',
            program: 'lapw1',
            flags: { parallel: true, extra: ['-it'] },
            requiredInput: files.potential,
        });

        assert.equal(outcome.status, 'completed');
        assert.deepEqual(calls, [{ file: 'x', args: ['lapw1', '-p', '-it'], cwd: dir }]);
        const log = fs.readFileSync(files.runLog, 'utf-8');
        assert.ok(log.includes('>   lapw1 -p -it\t('));
        assert.ok(log.includes('LAPW1 END\n'));
    });
});

test('a non-zero exit is a stage failure carrying the stage and status', async () => {
    await withTmpDir('stage-runner-', async dir => {
        const files = new CaseFiles(dir, 'case');
        const runner = new StageRunner({ files, runLog: new RunLog(files.runLog), executor: recordingExecutor([], 3, 'error') });

        await assert.rejects(
            runner.run({ stage: 'potential', program: 'lapw0', flags: {} }),
            (e: unknown) =>
                e instanceof CycleError &&
                e.code === 'STAGE_FAILED' &&
                e.structured.context.stage === 'potential' &&
                e.structured.context.exit_code === 3
        );
    });
});
