/**
 * Installer technology a package or an installed record uses.
 * Adapters are looked up by this tag.
 */
export const INSTALL_METHODS = ['msi', 'nsis', 'inno', 'installshield', 'custom'] as const;

export type InstallMethod = typeof INSTALL_METHODS[number];

export const ARCHITECTURES = ['x86', 'x64', 'arm64'] as const;

export type Architecture = typeof ARCHITECTURES[number];

/**
 * Argument templates for each interactivity level.
 * `log` may contain the `{path}` placeholder, replaced with the quoted log file path.
 */
export type InstallerArgs = {
    silent?: string;
    interactive?: string;
    passive?: string;
    log?: string;
}

/**
 * One downloadable installer declared by a package
 */
export type InstallerCandidate = {
    location: string;
    sha256: string;
    architecture?: Architecture;
}

export type PackageDescriptor = {
    /** Identifier used on the command line and for log file names */
    id: string;

    /** Display name */
    name: string;

    version?: string;

    installMethod: InstallMethod;

    installers: InstallerCandidate[];

    /**
     * Package specific arguments appended after the adapter's own arguments
     * for the same interactivity level. A `log` template here replaces the adapter's.
     */
    args?: InstallerArgs;
}
