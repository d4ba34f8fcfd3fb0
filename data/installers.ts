// ============================================================================
// Built-in installer adapters
// ============================================================================

import { ExitCodeTable, InstallerAdapter, InstallTarget, UninstallTarget } from '../lib/models';
import { parseUninstallString } from '../lib/uninstall-string';

const MSIEXEC = 'msiexec.exe';

/**
 * Windows Installer error codes most often returned by msiexec
 */
export const MSI_EXIT_CODES: ExitCodeTable = {
    1601: 'The Windows Installer service could not be accessed',
    1602: 'User cancelled installation',
    1603: 'Fatal error during installation',
    1605: 'This action is only valid for products that are currently installed',
    1612: 'The installation source for this product is not available',
    1618: 'Another installation is already in progress',
    1619: 'This installation package could not be opened',
    1620: 'This installation package could not be opened. Verify that it is a valid Windows Installer package',
    1622: 'Error opening installation log file',
    1625: 'This installation is forbidden by system policy',
    1633: 'This installation package is not supported on this processor type',
    1638: 'Another version of this product is already installed',
    1639: 'Invalid command line argument',
    1641: 'The installer has initiated a restart',
    3010: 'A restart is required to complete the install',
};

export const NSIS_EXIT_CODES: ExitCodeTable = {
    1: 'Installation aborted by user',
    2: 'Installation aborted by script',
};

export const INNO_EXIT_CODES: ExitCodeTable = {
    1: 'Setup failed to initialize',
    2: 'The user cancelled the wizard before the installation started',
    3: 'A fatal error occurred while preparing to move to the next installation phase',
    4: 'A fatal error occurred during the actual installation process',
    5: 'The user cancelled during the actual installation process',
    6: 'The Setup process was forcefully terminated by the debugger',
    7: 'The Preparing to Install stage determined that Setup cannot proceed with installation',
    8: 'Setup cannot proceed with installation until the system is restarted',
};

const INNO_SILENT = '/VERYSILENT /SP- /SUPPRESSMSGBOXES /NORESTART';
const INNO_PASSIVE = '/SILENT /SP- /SUPPRESSMSGBOXES /NORESTART';

const runInstallerFile = ({ installerPath }: InstallTarget): string => installerPath;
const runUninstallKey = ({ key }: UninstallTarget): string => key;

/**
 * Arguments that were registered alongside the uninstaller, e.g. `/uninstall` flags
 */
const registeredArguments = ({ record }: UninstallTarget): Record<string, string> => ({
    arguments: record.uninstallString ? parseUninstallString(record.uninstallString).args : '',
});

/**
 * NSIS uninstallers copy themselves to %TEMP% and exit at once unless `_?=` names the
 * install folder. It must come last and stays unquoted even when the path has spaces.
 */
const nsisUninstallArguments = (target: UninstallTarget): Record<string, string> => {
    const registered = registeredArguments(target).arguments;
    const folder = target.record.installationPath?.replace(/[\\/]+$/, '');
    return {
        arguments: folder ? `${registered} _?=${folder}`.trim() : registered,
    };
};

export const installAdapters: InstallerAdapter<InstallTarget>[] = [
    {
        installMethod: 'msi',
        args: {
            silent: '/i {installer} /qn /norestart',
            passive: '/i {installer} /passive /norestart',
            interactive: '/i {installer}',
            log: '/l*v {path}',
        },
        exitCodes: MSI_EXIT_CODES,
        processPath: () => MSIEXEC,
        placeholders: ({ installerPath }) => ({ installer: `"${installerPath}"` }),
    },
    {
        installMethod: 'nsis',
        args: {
            silent: '/S',
            interactive: '',
        },
        exitCodes: NSIS_EXIT_CODES,
        processPath: runInstallerFile,
    },
    {
        installMethod: 'inno',
        args: {
            silent: INNO_SILENT,
            passive: INNO_PASSIVE,
            interactive: '/SP-',
            log: '/LOG={path}',
        },
        exitCodes: INNO_EXIT_CODES,
        processPath: runInstallerFile,
    },
    {
        // InstallShield wraps an MSI package; /v hands arguments to msiexec
        installMethod: 'installshield',
        args: {
            silent: '/s /v"/qn /norestart"',
            passive: '/s /v"/passive /norestart"',
            interactive: '',
        },
        exitCodes: MSI_EXIT_CODES,
        processPath: runInstallerFile,
    },
    {
        installMethod: 'custom',
        args: {},
        exitCodes: {},
        processPath: runInstallerFile,
    },
];

export const uninstallAdapters: InstallerAdapter<UninstallTarget>[] = [
    {
        installMethod: 'msi',
        args: {
            silent: '/x {key} /qn /norestart',
            passive: '/x {key} /passive /norestart',
            interactive: '/x {key}',
            log: '/l*v {path}',
        },
        exitCodes: MSI_EXIT_CODES,
        processPath: () => MSIEXEC,
        placeholders: ({ key }) => ({ key }),
    },
    {
        installMethod: 'nsis',
        args: {
            silent: '/S {arguments}',
            interactive: '{arguments}',
        },
        exitCodes: NSIS_EXIT_CODES,
        processPath: runUninstallKey,
        placeholders: nsisUninstallArguments,
    },
    {
        installMethod: 'inno',
        args: {
            silent: '{arguments} /VERYSILENT /SUPPRESSMSGBOXES /NORESTART',
            passive: '{arguments} /SILENT /SUPPRESSMSGBOXES /NORESTART',
            interactive: '{arguments}',
            log: '/LOG={path}',
        },
        exitCodes: INNO_EXIT_CODES,
        processPath: runUninstallKey,
        placeholders: registeredArguments,
    },
    {
        installMethod: 'custom',
        args: {
            interactive: '{arguments}',
        },
        exitCodes: {},
        processPath: runUninstallKey,
        placeholders: registeredArguments,
    },
];
