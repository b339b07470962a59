/**
 * Structured Error Schema for SCF run failures
 *
 * Provides machine-readable errors with the operator actions that can
 * continue a run after it stopped. The controller turns these into a
 * CycleOutcome; the CLI prints the recovery options.
 */

/* -------------------------------------------------------------------------- */
/* Types                                                                      */
/* -------------------------------------------------------------------------- */

export type ErrorCode =
    // Run inputs
    | 'MISSING_INPUT'
    | 'INVALID_OPTIONS'

    // External programs
    | 'STAGE_FAILED'
    | 'COMPARISON_TOOL_FAILED'

    // Infrastructure
    | 'FILESYSTEM_ERROR'
    | 'LEDGER_FAILURE';

export type RiskLevel = 'LOW' | 'MEDIUM' | 'HIGH';

export type RecoveryAction =
    | 'restart_from_stage'
    | 'provide_input_artifact'
    | 'inspect_stage_output'
    | 'fix_options'
    | 'check_comparison_tool'
    | 'abort_run';

export interface RecoveryOption {
    action: RecoveryAction;
    description: string;
    risk_level: RiskLevel;
    command?: string; // Suggested shell command for the operator
}

export interface StructuredError {
    code: ErrorCode;
    message: string;
    severity: 'FATAL' | 'ERROR' | 'WARNING';
    context: Record<string, unknown>;
    recovery_options: RecoveryOption[];
    timestamp: string;
}

/* -------------------------------------------------------------------------- */
/* Error Builders                                                             */
/* -------------------------------------------------------------------------- */

const RISK_ORDER: Record<RiskLevel, number> = { LOW: 0, MEDIUM: 1, HIGH: 2 };

export function createStructuredError(
    code: ErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    recoveryOptions: RecoveryOption[] = []
): StructuredError {
    return {
        code,
        message,
        severity: getSeverity(code),
        context,
        recovery_options: [...recoveryOptions].sort(
            (a, b) => RISK_ORDER[a.risk_level] - RISK_ORDER[b.risk_level]
        ),
        timestamp: new Date().toISOString()
    };
}

function getSeverity(code: ErrorCode): 'FATAL' | 'ERROR' | 'WARNING' {
    const fatalCodes: ErrorCode[] = [
        'STAGE_FAILED',
        'COMPARISON_TOOL_FAILED',
        'FILESYSTEM_ERROR'
    ];

    const warningCodes: ErrorCode[] = [
        'LEDGER_FAILURE'
    ];

    if (fatalCodes.includes(code)) return 'FATAL';
    if (warningCodes.includes(code)) return 'WARNING';
    return 'ERROR';
}

/** errno code of a Node.js system error (ENOENT, EPERM, ...). */
export function errnoCode(e: unknown): string | undefined {
    if (e instanceof Error && 'code' in e && typeof e.code === 'string') return e.code;
    return undefined;
}

/**
 * Thrown by the layers below the controller; the controller catches it at the
 * top of the cycle and converts it into a terminal outcome.
 */
export class CycleError extends Error {
    constructor(public readonly structured: StructuredError) {
        super(structured.message);
        this.name = 'CycleError';
    }

    get code(): ErrorCode {
        return this.structured.code;
    }
}

/* -------------------------------------------------------------------------- */
/* Common Recovery Options                                                    */
/* -------------------------------------------------------------------------- */

export const CommonRecoveryOptions = {
    restartFromStage: (stage: string): RecoveryOption => ({
        action: 'restart_from_stage',
        description: `Fix the cause and resume the cycle at ${stage}`,
        risk_level: 'LOW',
        command: `scfctl --start ${stage}`
    }),

    provideInput: (artifact: string): RecoveryOption => ({
        action: 'provide_input_artifact',
        description: `Create or restore ${artifact} (it is absent or empty)`,
        risk_level: 'LOW'
    }),

    inspectOutput: (logPath: string): RecoveryOption => ({
        action: 'inspect_stage_output',
        description: `Read the stage output appended to ${logPath}`,
        risk_level: 'LOW',
        command: `tail -n 50 ${logPath}`
    }),

    abortRun: (reason: string): RecoveryOption => ({
        action: 'abort_run',
        description: `Abandon the run: ${reason}`,
        risk_level: 'HIGH'
    })
};

/* -------------------------------------------------------------------------- */
/* Error Factory Methods                                                      */
/* -------------------------------------------------------------------------- */

export class ErrorFactory {
    static stageFailed(stage: string, program: string, exitCode: number, logPath: string): CycleError {
        return new CycleError(createStructuredError(
            'STAGE_FAILED',
            `Stage ${stage} (${program}) exited with status ${exitCode}`,
            { stage, program, exit_code: exitCode },
            [
                CommonRecoveryOptions.inspectOutput(logPath),
                CommonRecoveryOptions.restartFromStage(stage),
                CommonRecoveryOptions.abortRun('stage keeps failing')
            ]
        ));
    }

    static missingInput(stage: string, artifact: string): CycleError {
        return new CycleError(createStructuredError(
            'MISSING_INPUT',
            `Required input ${artifact} for stage ${stage} is missing or empty`,
            { stage, artifact },
            [
                CommonRecoveryOptions.provideInput(artifact),
                CommonRecoveryOptions.restartFromStage(stage)
            ]
        ));
    }

    static comparisonFailed(quantity: string, exitCode: number, output: string): CycleError {
        return new CycleError(createStructuredError(
            'COMPARISON_TOOL_FAILED',
            `Convergence comparison for ${quantity} failed with status ${exitCode}`,
            { quantity, exit_code: exitCode, output: output.slice(0, 2000) },
            [
                {
                    action: 'check_comparison_tool',
                    description: 'Verify the comparison tool is on PATH and the history file is readable',
                    risk_level: 'LOW'
                }
            ]
        ));
    }

    static invalidOptions(errors: string[]): CycleError {
        return new CycleError(createStructuredError(
            'INVALID_OPTIONS',
            `Invalid options: ${errors.join('; ')}`,
            { errors },
            [
                {
                    action: 'fix_options',
                    description: 'Correct the command line (see scfctl --help)',
                    risk_level: 'LOW',
                    command: 'scfctl --help'
                }
            ]
        ));
    }

    static filesystem(operation: string, target: string, cause: unknown): CycleError {
        return new CycleError(createStructuredError(
            'FILESYSTEM_ERROR',
            `${operation} failed for ${target}: ${cause instanceof Error ? cause.message : String(cause)}`,
            { operation, target }
        ));
    }
}
