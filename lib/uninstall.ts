import { AdapterRegistry, initializeAdapter } from './adapters';
import { IInstalledRecordSource, IRecordMatcher, IUnlocker } from './interfaces/collaborator-interfaces';
import { InstalledRecord, UninstallOptions, UninstallOutcome, UninstallTarget } from './models';
import { RunnerDependencies, runInstaller } from './runner';

export type UninstallDependencies = RunnerDependencies & {
    recordSource: IInstalledRecordSource;
    matcher: IRecordMatcher;
    unlocker: IUnlocker;
    uninstallers: AdapterRegistry<UninstallTarget>;
}

export function describeRecord(record: InstalledRecord): string {
    return `${record.displayName} ${record.displayVersion ?? ''}`.trim();
}

/**
 * Uninstalls the single installed record matching the requested package.
 * Nothing is run when no record, or more than one, matches.
 */
export async function uninstallPackage(
    options: UninstallOptions,
    deps: UninstallDependencies,
): Promise<UninstallOutcome> {
    const { logger } = deps;
    const { packageId } = options;

    logger.info(`Beginning uninstallation of '${packageId}'`);

    const records = await deps.recordSource.records();
    const candidates = await deps.matcher.matchFor(records, packageId);

    if (candidates.length === 0) {
        logger.warn(`Couldn't find an installed package matching '${packageId}'`);
        return { status: 'not-found' };
    }

    if (candidates.length > 1) {
        logger.warn(`Found more than one installed package for '${packageId}'`);
        candidates.forEach(candidate => logger.warn(describeRecord(candidate)));
        return { status: 'ambiguous', candidates };
    }

    const [record] = candidates;

    if (record.installationPath) {
        await deps.unlocker.unlock(record.installationPath, record.installMethod);
    }

    const key = deps.recordSource.key(record);
    const adapter = deps.uninstallers.get(record.installMethod);
    const initialized = initializeAdapter(adapter, { record, key });

    await runInstaller(options.interactivity, packageId, undefined, initialized, deps);

    logger.info(`Uninstallation completed successfully for '${packageId}'`);
    return { status: 'uninstalled', record };
}
