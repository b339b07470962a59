import test from 'node:test';
import assert from 'node:assert/strict';
import fs from 'node:fs';
import path from 'node:path';

import { atomicWriteFileSync } from '../src/atomic_write';
import { withTmpDir } from './helpers';

function errno(message: string, code: string): Error {
    return Object.assign(new Error(message), { code });
}

test('rewrites the file in place and keeps its mode', async () => {
    await withTmpDir('atomic-', dir => {
        const file = path.join(dir, 'case.inm');
        fs.writeFileSync(file, 'MSR1a\n');
        fs.chmodSync(file, 0o640);

        atomicWriteFileSync({ filePath: file, content: 'MSR1\n' });

        assert.equal(fs.readFileSync(file, 'utf-8'), 'MSR1\n');
        assert.equal(fs.statSync(file).mode & 0o777, 0o640);
        assert.deepEqual(fs.readdirSync(dir), ['case.inm']);
    });
});

test('an unsupported fsync is logged as a warning and the write completes', async t => {
    await withTmpDir('atomic-', dir => {
        const file = path.join(dir, 'case.in2');
        const stderr: string[] = [];
        t.mock.method(fs, 'fdatasyncSync', () => {
            throw errno('fsync not supported', 'EINVAL');
        });
        t.mock.method(process.stderr, 'write', (chunk: unknown) => {
            stderr.push(String(chunk));
            return true;
        });

        atomicWriteFileSync({ filePath: file, content: 'TOT\n' });

        assert.equal(fs.readFileSync(file, 'utf-8'), 'TOT\n');
        const warning = stderr.find(line => line.includes('fsync unsupported here, continuing without it'));
        assert.ok(warning?.includes('EINVAL'));
    });
});

test('any other fsync failure aborts the write and removes the temp file', async t => {
    await withTmpDir('atomic-', dir => {
        const file = path.join(dir, 'case.in2');
        fs.writeFileSync(file, 'TOT\n');
        t.mock.method(fs, 'fdatasyncSync', () => {
            throw errno('disk failure', 'EIO');
        });

        assert.throws(() => atomicWriteFileSync({ filePath: file, content: 'FOR\n' }), /disk failure/);
        assert.equal(fs.readFileSync(file, 'utf-8'), 'TOT\n');
        assert.deepEqual(fs.readdirSync(dir), ['case.in2']);
    });
});
