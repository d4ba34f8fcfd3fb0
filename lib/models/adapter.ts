import { InstallMethod, InstallerArgs, PackageDescriptor } from './package';
import { InstalledRecord } from './record';

/**
 * Installer exit code to human readable reason
 */
export type ExitCodeTable = Readonly<Record<number, string>>;

/**
 * What an install adapter is bound to
 */
export type InstallTarget = {
    package: PackageDescriptor;
    installerPath: string;
}

/**
 * What an uninstall adapter is bound to
 */
export type UninstallTarget = {
    record: InstalledRecord;
    key: string;
}

/**
 * Technology specific knowledge about one installer family.
 * Adding a technology means registering one of these, nothing else.
 */
export type InstallerAdapter<TTarget> = {
    installMethod: InstallMethod;
    args: InstallerArgs;
    exitCodes: ExitCodeTable;
    processPath: (target: TTarget) => string;

    /**
     * Values for `{name}` tokens in the templates, e.g. `{installer}` or `{key}`.
     * `{path}` is reserved for the log file and never substituted here.
     */
    placeholders?: (target: TTarget) => Record<string, string>;
}

/**
 * An adapter bound to its target, ready to run
 */
export type InitializedAdapter = {
    installMethod: InstallMethod;
    args: InstallerArgs;
    exitCodes: ExitCodeTable;
    executablePath: string;
}
