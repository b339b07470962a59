/**
 * Stage Runner: runs one external computation stage to completion.
 *
 * A stage whose required input is absent or empty is never started; the
 * caller gets a `missing-input` outcome and picks its alternate branch.
 * Any non-zero exit is fatal for the run and surfaces as a CycleError.
 * There is no timeout and no retry at this layer.
 */

import type { CaseFiles } from './case_files';
import { type CommandExecutor, execaExecutor, splitCommand } from './command_executor';
import { createLogger, setCorrelation } from './logger';
import type { RunLog } from './run_log';
import type { StageFlags, StageInvocation, StageRunOutcome } from './scf_types';
import { ErrorFactory } from './structured_error';

const log = createLogger('stage-runner');

export function renderFlags(flags: StageFlags): string[] {
    const args: string[] = [];
    if (flags.parallel) args.push('-p');
    if (flags.complex) args.push('-c');
    if (flags.spinOrbit) args.push('-so');
    if (flags.hartreeFock) args.push('-hf');
    if (flags.kpointSet) args.push(`-${flags.kpointSet}`);
    if (flags.response) args.push('-vresp');
    if (flags.extra) args.push(...flags.extra);
    return args;
}

export interface StageRunnerOptions {
    files: CaseFiles;
    runLog: RunLog;
    executor?: CommandExecutor;
    /** Launcher prefix such as `x`; empty runs the stage program directly. */
    launcher?: string;
}

export interface StageRunnerInterface {
    run(invocation: StageInvocation): Promise<StageRunOutcome>;
}

export class StageRunner implements StageRunnerInterface {
    private readonly files: CaseFiles;
    private readonly runLog: RunLog;
    private readonly executor: CommandExecutor;
    private readonly launcher: string[];

    constructor(options: StageRunnerOptions) {
        this.files = options.files;
        this.runLog = options.runLog;
        this.executor = options.executor ?? execaExecutor;
        this.launcher = splitCommand(options.launcher ?? '');
    }

    async run(invocation: StageInvocation): Promise<StageRunOutcome> {
        const { stage, program, flags, requiredInput } = invocation;
        setCorrelation({ stage });

        if (requiredInput !== undefined && !this.files.hasContent(requiredInput)) {
            log.warn('required input missing, stage not started', { stage, artifact: requiredInput });
            this.runLog.note(`${stage}: ${requiredInput} missing or empty, not started`);
            return { status: 'missing-input', stage, artifact: requiredInput };
        }

        const args = renderFlags(flags);
        const [file, ...prefix] = this.launcher.length > 0 ? [...this.launcher, program] : [program];
        const argv = [...prefix, ...args];

        this.runLog.stageHeader(program, args);
        log.info(`running ${program}`, { stage, args });

        const started = Date.now();
        const result = await this.executor(file, argv, { cwd: this.files.dir });
        const durationMs = Date.now() - started;

        this.runLog.stageOutput(result.output);

        if (result.exitCode !== 0) {
            log.error(`${program} failed`, { stage, exit_code: result.exitCode, duration_ms: durationMs });
            throw ErrorFactory.stageFailed(stage, program, result.exitCode, this.runLog.file);
        }

        log.debug(`${program} completed`, { stage, duration_ms: durationMs });
        return { status: 'completed', stage, durationMs };
    }
}
