import { ExitCodeTable, RunResult } from './models';

/**
 * Turns an installer exit code into a result.
 * A log path is reported only for failures, and only if one was requested.
 */
export function classifyOutcome(exitCode: number, exitCodes: ExitCodeTable, logPath?: string): RunResult {
    if (exitCode === 0) {
        return { success: true, exitCode };
    }

    const result: RunResult = {
        success: false,
        exitCode,
        reason: exitCodes[exitCode] ?? '',
    };

    if (logPath !== undefined) {
        result.logPath = logPath;
    }

    return result;
}
