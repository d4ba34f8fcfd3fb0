import { z } from 'zod';
import { errorMessage, RecordSourceError, UninstallerNotRegisteredError } from './errors';
import { IInstalledRecordSource, IPriorInstallationLookup } from './interfaces/collaborator-interfaces';
import { ConsoleLogger, ILogger } from './interfaces/logger-interface';
import { IShell, NodeShell } from './interfaces/shell-interface';
import { normalizeName } from './matcher';
import { InstalledRecord, InstallMethod, PriorInstallation } from './models';
import { parseUninstallString } from './uninstall-string';

const UNINSTALL_KEYS = [
    'HKLM:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
    'HKLM:\\SOFTWARE\\WOW6432Node\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
    'HKCU:\\SOFTWARE\\Microsoft\\Windows\\CurrentVersion\\Uninstall\\*',
];

const INNO_APP_PATH = 'Inno Setup: App Path';

const LIST_COMMAND = 'powershell -NoProfile -Command "'
    + `Get-ItemProperty ${UNINSTALL_KEYS.join(',')} -ErrorAction SilentlyContinue`
    + ' | Where-Object { $_.DisplayName }'
    + ` | Select-Object PSChildName,DisplayName,DisplayVersion,InstallLocation,UninstallString,WindowsInstaller,'${INNO_APP_PATH}'`
    + ' | ConvertTo-Json -Compress"';

const registryEntrySchema = z.object({
    PSChildName: z.string().min(1),
    DisplayName: z.string().min(1),
    DisplayVersion: z.string().nullish(),
    InstallLocation: z.string().nullish(),
    UninstallString: z.string().nullish(),
    WindowsInstaller: z.number().nullish(),
    [INNO_APP_PATH]: z.string().nullish(),
});

type RegistryEntry = z.infer<typeof registryEntrySchema>;

/**
 * Guesses the installer technology from what the installer left in the registry
 */
export function detectInstallMethod(entry: RegistryEntry): InstallMethod {
    if (entry.WindowsInstaller === 1) {
        return 'msi';
    }
    const uninstaller = entry.UninstallString ? parseUninstallString(entry.UninstallString).executable : '';
    if (entry[INNO_APP_PATH] || /unins\d{3}\.exe$/i.test(uninstaller)) {
        return 'inno';
    }
    if (/uninst(all)?\.exe$/i.test(uninstaller)) {
        return 'nsis';
    }
    return 'custom';
}

export function toInstalledRecord(entry: RegistryEntry): InstalledRecord {
    const installMethod = detectInstallMethod(entry);
    const record: InstalledRecord = {
        id: entry.PSChildName,
        installMethod,
        displayName: entry.DisplayName,
    };

    if (entry.DisplayVersion) record.displayVersion = entry.DisplayVersion;
    if (entry.InstallLocation) record.installationPath = entry.InstallLocation;
    if (entry.UninstallString) record.uninstallString = entry.UninstallString;
    if (installMethod === 'msi') record.windowsInstallerId = entry.PSChildName;

    return record;
}

/**
 * Parses `ConvertTo-Json` output: a single object for one entry, an array otherwise.
 * Entries that do not look like uninstall records are skipped.
 */
export function parseRegistryOutput(stdout: string, logger: ILogger = new ConsoleLogger()): InstalledRecord[] {
    const trimmed = stdout.trim();
    if (!trimmed) {
        return [];
    }

    const parsed: unknown = JSON.parse(trimmed);
    const entries: unknown[] = Array.isArray(parsed) ? parsed : [parsed];
    const records: InstalledRecord[] = [];

    for (const entry of entries) {
        const result = registryEntrySchema.safeParse(entry);
        if (result.success) {
            records.push(toInstalledRecord(result.data));
        } else {
            logger.debug(`Skipping unreadable uninstall entry: ${result.error.issues[0]?.message ?? 'invalid'}`);
        }
    }

    return records;
}

/**
 * Installed software as recorded under the Windows Uninstall registry keys
 */
export class RegistryInstalledRecordSource implements IInstalledRecordSource {
    constructor(
        private readonly shell: IShell = new NodeShell(),
        private readonly logger: ILogger = new ConsoleLogger(),
    ) {}

    async records(): Promise<InstalledRecord[]> {
        try {
            const { stdout } = await this.shell.exec(LIST_COMMAND);
            return parseRegistryOutput(stdout, this.logger);
        } catch (error) {
            throw new RecordSourceError(errorMessage(error));
        }
    }

    /**
     * The value an uninstaller is re-targeted with: the product code for MSI records,
     * the uninstaller executable for everything else
     */
    key(record: InstalledRecord): string {
        if (record.installMethod === 'msi') {
            return record.windowsInstallerId ?? record.id;
        }
        if (!record.uninstallString) {
            throw new UninstallerNotRegisteredError(record.displayName);
        }
        return parseUninstallString(record.uninstallString).executable;
    }
}

/**
 * Finds earlier installations of a package among the installed records.
 * A record counts only when its display name equals the package id or name
 * once case and punctuation are ignored; partial matches are other software.
 */
export class RegistryPriorInstallationLookup implements IPriorInstallationLookup {
    constructor(private readonly recordSource: IInstalledRecordSource) {}

    async updatesFor(packageId: string, packageName?: string): Promise<PriorInstallation[]> {
        const names = new Set([packageId, packageName ?? ''].map(normalizeName).filter(name => name !== ''));
        if (names.size === 0) {
            return [];
        }

        const records = await this.recordSource.records();
        return records
            .filter(record => names.has(normalizeName(record.displayName)))
            .map(record => ({ installationPath: record.installationPath }));
    }
}
