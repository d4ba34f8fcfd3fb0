import { errorMessage, InstallerTerminatedError, LaunchFailureError } from './errors';
import { IProcessController, NodeProcessController, ProcessHandle } from './interfaces/process-interface';
import { ConsoleLogger, ILogger } from './interfaces/logger-interface';
import { RunProcessOptions } from './models';

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

/**
 * Maps a spawn error to a launch failure with a hint for the common causes
 */
export function toLaunchFailure(executablePath: string, error: unknown): LaunchFailureError {
    const code = errorCode(error);
    const original = errorMessage(error);

    let message = `Failed to start ${executablePath}: ${original}`;
    if (code === 'EACCES' || code === 'EPERM') {
        message = `Access denied starting ${executablePath}. This may require administrator privileges. (Original error: ${original})`;
    } else if (code === 'ENOENT') {
        message = `Executable not found: ${executablePath}. The installer may have been moved or deleted.`;
    } else if (code === 'EFTYPE' || code === 'UNKNOWN') {
        message = `Cannot execute file directly: ${executablePath}. The file may not be an executable or may be corrupted.`;
    }

    return new LaunchFailureError(executablePath, message, code);
}

/**
 * Starts an installer/uninstaller process with the argument string passed verbatim and waits for it to exit.
 * Resolves with the process's own exit code; a process that cannot be started rejects with a LaunchFailureError.
 * No timeout is applied: an installer that never exits keeps the promise pending.
 */
export async function runProcess(
    executablePath: string,
    argumentString: string,
    options: RunProcessOptions = {},
    processController?: IProcessController,
    logger?: ILogger,
): Promise<number> {
    const { onProgress } = options;
    const controller = processController || new NodeProcessController();
    const log = logger || new ConsoleLogger();
    // Installers parse their own command line, so the string goes through untouched
    const args = argumentString ? [argumentString] : [];

    log.debug(`Starting ${executablePath} ${argumentString}`.trim());

    return new Promise((resolve, reject) => {
        let child: ProcessHandle;
        try {
            child = controller.start(executablePath, args, {
                stdio: 'ignore',
                shell: false,
                windowsVerbatimArguments: true,
            });
        } catch (error) {
            reject(toLaunchFailure(executablePath, error));
            return;
        }

        log.info('Waiting for installation to complete ...');

        const startTime = Date.now();
        let settled = false;
        let progressInterval: NodeJS.Timeout | null = null;

        if (onProgress) {
            progressInterval = setInterval(() => {
                onProgress(Date.now() - startTime);
            }, 100);
        }

        const settle = (): boolean => {
            if (settled) return false;
            settled = true;
            if (progressInterval) clearInterval(progressInterval);
            return true;
        };

        child.on('close', (code, signal) => {
            if (!settle()) return;

            if (code === null) {
                reject(new InstallerTerminatedError(executablePath, signal));
                return;
            }

            log.debug(`${executablePath} exited with code ${code}`);
            resolve(code);
        });

        child.on('error', (error) => {
            if (!settle()) return;
            reject(toLaunchFailure(executablePath, error));
        });
    });
}
