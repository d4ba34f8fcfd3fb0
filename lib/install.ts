import { AdapterRegistry, initializeAdapter } from './adapters';
import {
    IInstallerSelector,
    IPriorInstallationLookup,
    ITransferService,
    IUnlocker,
} from './interfaces/collaborator-interfaces';
import { InstallOptions, InstallTarget, PackageDescriptor, RunResult } from './models';
import { RunnerDependencies, runInstaller } from './runner';

export type InstallDependencies = RunnerDependencies & {
    selector: IInstallerSelector;
    transfer: ITransferService;
    priorInstallations: IPriorInstallationLookup;
    unlocker: IUnlocker;
    installers: AdapterRegistry<InstallTarget>;
}

/**
 * Downloads, prepares and runs the installer for a package.
 * Every stage is awaited in order; any failure ends the operation.
 */
export async function installPackage(
    pkg: PackageDescriptor,
    options: InstallOptions,
    deps: InstallDependencies,
): Promise<RunResult> {
    const { logger, eventSink } = deps;

    logger.info(`Beginning installation of '${pkg.id}'`);
    eventSink.publish({ type: 'initialization', packageId: pkg.id });

    const installer = deps.selector.bestInstaller(pkg.installers);
    const installerPath = await deps.transfer.fetch(installer.location, deps.pathResolver.tempFolder, installer.sha256);

    // Earlier installations may hold files open that the installer needs to replace
    const priorInstallations = await deps.priorInstallations.updatesFor(pkg.id, pkg.name);
    for (const prior of priorInstallations) {
        if (prior.installationPath) {
            await deps.unlocker.unlock(prior.installationPath, pkg.installMethod);
        }
    }

    const adapter = deps.installers.get(pkg.installMethod);
    const initialized = initializeAdapter(adapter, { package: pkg, installerPath });

    const result = await runInstaller(options.interactivity, pkg.id, pkg.args, initialized, deps);

    logger.info(`Installation completed successfully for '${pkg.id}'`);
    eventSink.publish({ type: 'success', packageId: pkg.id });

    return result;
}
