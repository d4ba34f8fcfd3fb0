import { installAdapters, uninstallAdapters } from '../data/installers';
import { AdapterRegistry } from './adapters';
import { AppConfig } from './config';
import { isInstallerError } from './errors';
import { EventHub } from './events';
import { IEventSink } from './interfaces/event-interface';
import { NodeFileSystem } from './interfaces/fs-interface';
import { ConsoleLogger, ILogger } from './interfaces/logger-interface';
import { NodeProcessController } from './interfaces/process-interface';
import { IProgressBarFactory } from './interfaces/progress-interface';
import { NodeShell } from './interfaces/shell-interface';
import { InstallDependencies, installPackage } from './install';
import { RegistryInstalledRecordSource, RegistryPriorInstallationLookup } from './installed-records';
import { NameRecordMatcher } from './matcher';
import {
    InstallOptions,
    InstallTarget,
    OperationResult,
    PackageDescriptor,
    RunResult,
    UninstallOptions,
    UninstallOutcome,
    UninstallTarget,
} from './models';
import { PathResolver } from './paths';
import { ArchitectureInstallerSelector } from './selector';
import { HttpTransferService } from './transfer';
import { UninstallDependencies, uninstallPackage } from './uninstall';
import { PowerShellUnlocker } from './unlock';

export type ServiceDependencies = InstallDependencies & UninstallDependencies;

/**
 * Registries holding the built-in adapters
 */
export function createDefaultRegistries(): {
    installers: AdapterRegistry<InstallTarget>;
    uninstallers: AdapterRegistry<UninstallTarget>;
} {
    return {
        installers: new AdapterRegistry<InstallTarget>('install', installAdapters),
        uninstallers: new AdapterRegistry<UninstallTarget>('uninstall', uninstallAdapters),
    };
}

/**
 * Wires the Node/Windows implementations of every collaborator
 */
export function createDefaultDependencies(
    config: AppConfig,
    options: { logger?: ILogger; eventSink?: IEventSink; progressBarFactory?: IProgressBarFactory } = {},
): ServiceDependencies {
    const logger = options.logger || new ConsoleLogger(config.logLevel);
    const fileSystem = new NodeFileSystem();
    const shell = new NodeShell();
    const recordSource = new RegistryInstalledRecordSource(shell, logger);
    const matcher = new NameRecordMatcher();
    const { installers, uninstallers } = createDefaultRegistries();

    return {
        logger,
        eventSink: options.eventSink || new EventHub(),
        pathResolver: new PathResolver(config.tempDir, config.logDir, fileSystem),
        processController: new NodeProcessController(),
        selector: new ArchitectureInstallerSelector(),
        transfer: new HttpTransferService({ fileSystem, logger, progressBarFactory: options.progressBarFactory }),
        priorInstallations: new RegistryPriorInstallationLookup(recordSource),
        unlocker: new PowerShellUnlocker(shell, logger),
        recordSource,
        matcher,
        installers,
        uninstallers,
    };
}

async function capture<T>(operation: () => Promise<T>): Promise<OperationResult<T>> {
    try {
        return { success: true, value: await operation() };
    } catch (error) {
        if (isInstallerError(error)) {
            return { success: false, error };
        }
        throw error;
    }
}

/**
 * The two operations this package exposes. Installer failures come back as results;
 * anything else is a defect and is rethrown.
 */
export class InstallService {
    constructor(private readonly deps: ServiceDependencies) {}

    install(pkg: PackageDescriptor, options: InstallOptions): Promise<OperationResult<RunResult>> {
        return capture(() => installPackage(pkg, options, this.deps));
    }

    uninstall(options: UninstallOptions): Promise<OperationResult<UninstallOutcome>> {
        return capture(() => uninstallPackage(options, this.deps));
    }
}
