import { InstallerCandidate, InstalledRecord, InstallMethod, PriorInstallation } from '../models';

/**
 * Picks the installer to use among a package's candidates
 */
export interface IInstallerSelector {
    bestInstaller(candidates: InstallerCandidate[]): InstallerCandidate;
}

/**
 * Downloads an installer and verifies its checksum.
 * Never returns a path for a file that failed verification.
 */
export interface ITransferService {
    fetch(location: string, destinationDir: string, expectedSha256: string): Promise<string>;
}

/**
 * Earlier installations of the same package. Must not return other software:
 * the unlocker stops processes under every path returned.
 */
export interface IPriorInstallationLookup {
    updatesFor(packageId: string, packageName?: string): Promise<PriorInstallation[]>;
}

/**
 * Releases files under a folder so an installer can replace them.
 * Must be safe to call on a folder that is not locked.
 */
export interface IUnlocker {
    unlock(path: string, installMethod: InstallMethod): Promise<void>;
}

export interface IInstalledRecordSource {
    records(): Promise<InstalledRecord[]>;
    key(record: InstalledRecord): string;
}

export interface IRecordMatcher {
    matchFor(records: InstalledRecord[], packageId: string): Promise<InstalledRecord[]>;
}

export interface IPathResolver {
    readonly tempFolder: string;
    installerLogFile(packageId: string): string;
}
