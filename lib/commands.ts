import { findPackage } from './catalog';
import { IInstalledRecordSource } from './interfaces/collaborator-interfaces';
import { InteractivityLevel, PackageDescriptor } from './models';
import { InstallService } from './service';
import { formatRecordList, formatStatusLine } from './ui';
import { describeRecord } from './uninstall';

export type CommandContext = {
    service: InstallService;
    catalog: PackageDescriptor[];
    recordSource: IInstalledRecordSource;
    defaultInteractivity: InteractivityLevel;
}

/**
 * Installs catalog packages one after another.
 * Returns true when every package installed.
 */
export async function installPackages(
    context: CommandContext,
    packageIds: string[],
    interactivity: InteractivityLevel,
): Promise<boolean> {
    let allSucceeded = true;

    for (const packageId of packageIds) {
        const pkg = findPackage(context.catalog, packageId);
        if (!pkg) {
            console.log(formatStatusLine('failed', packageId, 'Unknown package. Type "list" to see available packages.'));
            allSucceeded = false;
            continue;
        }

        const result = await context.service.install(pkg, { interactivity });
        if (result.success) {
            console.log(formatStatusLine('completed', pkg.id, 'Installed'));
        } else {
            console.log(formatStatusLine('failed', pkg.id, result.error.message));
            allSucceeded = false;
        }
    }

    return allSucceeded;
}

/**
 * Uninstalls the installed software matching each id.
 * Ids that match nothing, or more than one record, are reported and skipped.
 */
export async function uninstallPackages(
    context: CommandContext,
    packageIds: string[],
    interactivity: InteractivityLevel,
): Promise<boolean> {
    let allSucceeded = true;

    for (const packageId of packageIds) {
        const result = await context.service.uninstall({ packageId, interactivity });
        if (!result.success) {
            console.log(formatStatusLine('failed', packageId, result.error.message));
            allSucceeded = false;
            continue;
        }

        const outcome = result.value;
        switch (outcome.status) {
            case 'uninstalled':
                console.log(formatStatusLine('completed', packageId, `Uninstalled ${describeRecord(outcome.record)}`));
                break;
            case 'not-found':
                console.log(formatStatusLine('skipped', packageId, 'Not installed'));
                break;
            case 'ambiguous':
                console.log(formatStatusLine('skipped', packageId, 'Matches more than one installed program:'));
                formatRecordList(outcome.candidates).forEach(line => console.log(`  ${line}`));
                console.log('  Use a more specific name.');
                break;
        }
    }

    return allSucceeded;
}

export function listPackages(catalog: PackageDescriptor[]): void {
    if (catalog.length === 0) {
        console.log('  No packages in catalog.');
        return;
    }

    catalog.forEach((pkg, index) => {
        const version = pkg.version ? ` ${pkg.version}` : '';
        console.log(`  ${index + 1}. ${pkg.id.padEnd(25)} ${pkg.name}${version} [${pkg.installMethod}]`);
    });
}

/**
 * Lists installed programs, optionally filtered by a case-insensitive pattern
 */
export async function listInstalled(recordSource: IInstalledRecordSource, pattern?: string): Promise<void> {
    const records = await recordSource.records();
    const patternLower = pattern?.toLowerCase();
    const matching = patternLower
        ? records.filter(record => record.displayName.toLowerCase().includes(patternLower))
        : records;

    if (matching.length === 0) {
        console.log('  No programs found.');
        return;
    }

    const sorted = [...matching].sort((a, b) => a.displayName.localeCompare(b.displayName));
    formatRecordList(sorted).forEach(line => console.log(line));
}
