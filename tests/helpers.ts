import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';

/** Run `fn` inside a fresh temporary directory that is removed afterwards. */
export async function withTmpDir<T>(prefix: string, fn: (dir: string) => Promise<T> | T): Promise<T> {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), prefix));
    try {
        return await fn(dir);
    } finally {
        fs.rmSync(dir, { recursive: true, force: true });
    }
}
