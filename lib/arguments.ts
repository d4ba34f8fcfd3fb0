import { InstallerArgs, InteractivityLevel } from './models';

export const LOG_PATH_PLACEHOLDER = '{path}';

export type BuiltArguments = {
    args: string;

    /** Set only when a logging template was applied */
    logPath?: string;
}

/**
 * Adapter arguments for the level followed by the package's own, space separated
 */
export function levelArguments(
    level: InteractivityLevel,
    packageArgs: InstallerArgs | undefined,
    adapterArgs: InstallerArgs,
): string {
    return `${adapterArgs[level] ?? ''} ${packageArgs?.[level] ?? ''}`.trim();
}

/**
 * The logging template in effect. A package template replaces the adapter's.
 */
export function loggingTemplate(packageArgs: InstallerArgs | undefined, adapterArgs: InstallerArgs): string | undefined {
    return packageArgs?.log ?? adapterArgs.log;
}

export function applyLogPath(template: string, logPath: string): string {
    return template.split(LOG_PATH_PLACEHOLDER).join(`"${logPath}"`);
}

/**
 * Builds the full argument string for an installer run.
 * `resolveLogPath` is only called when a logging template exists.
 */
export function buildArguments(
    level: InteractivityLevel,
    packageArgs: InstallerArgs | undefined,
    adapterArgs: InstallerArgs,
    resolveLogPath: () => string,
): BuiltArguments {
    const args = levelArguments(level, packageArgs, adapterArgs);
    const template = loggingTemplate(packageArgs, adapterArgs);

    if (template === undefined) {
        return { args };
    }

    const logPath = resolveLogPath();
    const loggingArgs = applyLogPath(template, logPath).trim();

    return {
        args: `${args} ${loggingArgs}`.trim(),
        logPath,
    };
}
