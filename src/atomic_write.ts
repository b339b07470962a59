// src/atomic_write.ts

import * as crypto from "crypto";
import * as fs from "fs";
import * as path from "path";
import { createLogger } from "./logger";
import { errnoCode } from "./structured_error";

const log = createLogger("atomic-write");

function isIgnorableFsync(code?: string): boolean {
    return code === "EPERM" || code === "EINVAL" || code === "EROFS";
}

/**
 * Replace `filePath` with `content` through a temp file and rename, keeping
 * the original mode. Stage input files are rewritten this way so a crash
 * never leaves a half-written input for the next stage.
 */
export function atomicWriteFileSync(params: {
    filePath: string;
    content: Buffer | string;
}): void {
    const { filePath, content } = params;

    const tmp = `${filePath}.tmp.${crypto.randomBytes(4).toString("hex")}`;
    const dir = path.dirname(filePath);

    let mode = 0o644;
    try {
        mode = fs.statSync(filePath).mode & 0o777;
    } catch {
        // new file keeps the default mode
    }

    try {
        fs.mkdirSync(dir, { recursive: true });
        fs.writeFileSync(tmp, content, { mode: 0o600 });

        try {
            const fd = fs.openSync(tmp, "r+");
            try {
                fs.fdatasyncSync(fd);
            } finally {
                fs.closeSync(fd);
            }
        } catch (e) {
            const code = errnoCode(e);
            if (!isIgnorableFsync(code)) throw e;
            log.warn("fsync unsupported here, continuing without it", { code, file: tmp });
        }

        fs.renameSync(tmp, filePath);
        fs.chmodSync(filePath, mode);
    } catch (e) {
        if (fs.existsSync(tmp)) fs.unlinkSync(tmp);
        throw e;
    }
}
