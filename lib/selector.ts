import { NoInstallerCandidatesError } from './errors';
import { IInstallerSelector } from './interfaces/collaborator-interfaces';
import { Architecture, InstallerCandidate } from './models';

export function hostArchitecture(arch: string = process.arch): Architecture {
    if (arch === 'x64' || arch === 'arm64') {
        return arch;
    }
    return 'x86';
}

/**
 * Prefers an installer built for the host, then a 32-bit or architecture neutral one
 */
export class ArchitectureInstallerSelector implements IInstallerSelector {
    constructor(private readonly architecture: Architecture = hostArchitecture()) {}

    bestInstaller(candidates: InstallerCandidate[]): InstallerCandidate {
        if (candidates.length === 0) {
            throw new NoInstallerCandidatesError();
        }

        return candidates.find(c => c.architecture === this.architecture)
            ?? candidates.find(c => c.architecture === undefined || c.architecture === 'x86')
            ?? candidates[0];
    }
}
