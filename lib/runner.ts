import { buildArguments } from './arguments';
import { InstallerExecutionError } from './errors';
import { IPathResolver } from './interfaces/collaborator-interfaces';
import { IEventSink } from './interfaces/event-interface';
import { ILogger } from './interfaces/logger-interface';
import { IProcessController } from './interfaces/process-interface';
import { resolveInteractivity } from './interactivity';
import { InitializedAdapter, InstallerArgs, InteractivityLevel, RunResult } from './models';
import { classifyOutcome } from './outcome';
import { runProcess } from './process';

/**
 * Collaborators shared by the install and uninstall pipelines
 */
export type RunnerDependencies = {
    pathResolver: IPathResolver;
    processController: IProcessController;
    eventSink: IEventSink;
    logger: ILogger;
    onProgress?: (packageId: string, elapsed: number) => void;
}

/**
 * Runs an initialized adapter and classifies the result.
 * Throws InstallerExecutionError when the installer exits with a non-zero code.
 */
export async function runInstaller(
    interactivity: InteractivityLevel,
    packageId: string,
    packageArgs: InstallerArgs | undefined,
    adapter: InitializedAdapter,
    deps: RunnerDependencies,
): Promise<RunResult> {
    const { logger, onProgress } = deps;

    deps.eventSink.publish({ type: 'executing', packageId });

    const level = resolveInteractivity(interactivity, packageArgs, adapter.args, logger);
    const { args, logPath } = buildArguments(level, packageArgs, adapter.args, () => deps.pathResolver.installerLogFile(packageId));

    if (logPath) {
        logger.info(`Writing installer log files to ${logPath}`);
    }

    const exitCode = await runProcess(
        adapter.executablePath,
        args,
        { onProgress: onProgress && ((elapsed: number) => onProgress(packageId, elapsed)) },
        deps.processController,
        logger,
    );

    const result = classifyOutcome(exitCode, adapter.exitCodes, logPath);
    if (!result.success) {
        throw new InstallerExecutionError(result.exitCode, packageId, result.reason || undefined, result.logPath);
    }

    return result;
}
