import { InstallerError } from '../errors';
import { InteractivityLevel } from './interactivity';
import { InstalledRecord } from './record';

/**
 * Options for installing one package
 */
export type InstallOptions = {
    interactivity: InteractivityLevel;
}

/**
 * Options for uninstalling one package
 */
export type UninstallOptions = {
    packageId: string;
    interactivity: InteractivityLevel;
}

/**
 * How an uninstall request ended when it did not fail
 */
export type UninstallOutcome =
    | { status: 'uninstalled'; record: InstalledRecord }
    | { status: 'not-found' }
    | { status: 'ambiguous'; candidates: InstalledRecord[] };

export type OperationResult<T = void> =
    | { success: true; value: T }
    | { success: false; error: InstallerError };
