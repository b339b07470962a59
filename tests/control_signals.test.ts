import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { FileControlChannel, MemoryControlChannel } from '../src/control_signals';
import { CycleError } from '../src/structured_error';
import { withTmpDir } from './helpers';

test('file channel maps signals to control files in the case directory', () => {
    const channel = new FileControlChannel('/cases/si');
    assert.equal(channel.fileFor('stop'), path.join('/cases/si', '.stop'));
    assert.equal(channel.fileFor('abort-adaptive-mode'), path.join('/cases/si', '.minstop'));
    assert.equal(channel.fileFor('force-full-diagonalization'), path.join('/cases/si', '.fulldiag'));
    assert.equal(channel.fileFor('drop-cached-inverse'), path.join('/cases/si', '.noHinv'));
});

test('consuming a file signal removes it so it acts once', async () => {
    await withTmpDir('signals-', dir => {
        const channel = new FileControlChannel(dir);
        fs.writeFileSync(path.join(dir, '.stop'), '');

        assert.equal(channel.isRaised('stop'), true);
        assert.equal(channel.consume('stop'), true);
        assert.equal(fs.existsSync(path.join(dir, '.stop')), false);
        assert.equal(channel.consume('stop'), false);
        assert.equal(channel.isRaised('force-full-diagonalization'), false);
    });
});

test('memory channel raises and consumes signals', () => {
    const channel = new MemoryControlChannel();
    channel.raise('drop-cached-inverse');

    assert.equal(channel.isRaised('drop-cached-inverse'), true);
    assert.equal(channel.consume('drop-cached-inverse'), true);
    assert.equal(channel.consume('drop-cached-inverse'), false);
    assert.equal(channel.isRaised('stop'), false);
});

test('a control file that cannot be removed is a filesystem error', async () => {
    await withTmpDir('signals-', dir => {
        fs.mkdirSync(path.join(dir, '.stop'));
        const channel = new FileControlChannel(dir);

        assert.throws(
            () => channel.consume('stop'),
            (e: unknown) => e instanceof CycleError && e.code === 'FILESYSTEM_ERROR' && e.message.startsWith('consume control signal failed for ')
        );
    });
});
