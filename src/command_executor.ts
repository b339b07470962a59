import execa from 'execa';

export interface CommandResult {
    exitCode: number;
    output: string; // stdout and stderr interleaved
}

/**
 * Runs an external program to completion. Never rejects on a non-zero exit;
 * callers classify the status themselves.
 */
export type CommandExecutor = (file: string, args: string[], options: { cwd: string }) => Promise<CommandResult>;

export const execaExecutor: CommandExecutor = async (file, args, options) => {
    const result = await execa(file, args, {
        cwd: options.cwd,
        reject: false,
        all: true,
        stdin: 'ignore',
    });
    // exitCode is undefined when the process was killed by a signal
    return {
        exitCode: typeof result.exitCode === 'number' ? result.exitCode : 128,
        output: result.all ?? `${result.stdout}${result.stderr}`,
    };
};

/** Split a launcher string such as `x` or `nice -n 5 x` into argv words. */
export function splitCommand(command: string): string[] {
    return command.trim().split(/\s+/).filter(word => word.length > 0);
}
