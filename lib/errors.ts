import { InstallMethod } from './models/package';

export type InstallerErrorKind =
    | 'adapter-not-found'
    | 'duplicate-adapter'
    | 'launch-failure'
    | 'terminated'
    | 'execution-failure'
    | 'no-installer'
    | 'transfer'
    | 'integrity'
    | 'no-uninstaller'
    | 'record-source'
    | 'log-folder';

/**
 * Base class for every failure an install or uninstall operation reports
 */
export abstract class InstallerError extends Error {
    abstract readonly kind: InstallerErrorKind;

    constructor(message: string) {
        super(message);
        this.name = new.target.name;
    }
}

export class AdapterNotFoundError extends InstallerError {
    readonly kind = 'adapter-not-found';

    constructor(readonly installMethod: InstallMethod, operation: 'install' | 'uninstall') {
        super(`No ${operation} adapter registered for install method '${installMethod}'`);
    }
}

/**
 * Two adapters claimed the same install method
 */
export class DuplicateAdapterError extends InstallerError {
    readonly kind = 'duplicate-adapter';

    constructor(readonly installMethod: InstallMethod) {
        super(`An adapter for install method '${installMethod}' is already registered`);
    }
}

export class LaunchFailureError extends InstallerError {
    readonly kind = 'launch-failure';

    constructor(readonly executablePath: string, message: string, readonly code?: string) {
        super(message);
    }
}

export class InstallerTerminatedError extends InstallerError {
    readonly kind = 'terminated';

    constructor(readonly executablePath: string, readonly signal: string | null) {
        super(`${executablePath} was terminated by signal ${signal ?? 'unknown'}`);
    }
}

/**
 * The installer ran and exited with a non-zero code
 */
export class InstallerExecutionError extends InstallerError {
    readonly kind = 'execution-failure';

    constructor(
        readonly exitCode: number,
        readonly packageId: string,
        readonly reason?: string,
        readonly logPath?: string,
    ) {
        super(formatExecutionFailure(exitCode, packageId, reason, logPath));
    }
}

function formatExecutionFailure(exitCode: number, packageId: string, reason?: string, logPath?: string): string {
    let message = `Installer for '${packageId}' failed with exit code ${exitCode}`;
    if (reason) {
        message += `: ${reason}`;
    }
    if (logPath) {
        message += `. Log: ${logPath}`;
    }
    return message;
}

export class NoInstallerCandidatesError extends InstallerError {
    readonly kind = 'no-installer';

    constructor() {
        super('Package does not declare any installers');
    }
}

export class TransferError extends InstallerError {
    readonly kind = 'transfer';

    constructor(readonly location: string, message: string) {
        super(`Failed to download ${location}: ${message}`);
    }
}

export class IntegrityError extends InstallerError {
    readonly kind = 'integrity';

    constructor(readonly location: string, readonly expected: string, readonly actual: string) {
        super(`Checksum mismatch for ${location}: expected ${expected}, got ${actual}`);
    }
}

/**
 * An installed record has neither a product code nor a registered uninstall command
 */
export class UninstallerNotRegisteredError extends InstallerError {
    readonly kind = 'no-uninstaller';

    constructor(readonly displayName: string) {
        super(`No uninstaller is registered for '${displayName}'`);
    }
}

/**
 * The installed software list could not be read
 */
export class RecordSourceError extends InstallerError {
    readonly kind = 'record-source';

    constructor(message: string) {
        super(`Failed to list installed programs: ${message}`);
    }
}

export class LogFolderError extends InstallerError {
    readonly kind = 'log-folder';

    constructor(readonly folder: string, message: string) {
        super(`Could not create log folder ${folder}: ${message}`);
    }
}

export function isInstallerError(error: unknown): error is InstallerError {
    return error instanceof InstallerError;
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
