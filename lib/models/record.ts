import { InstallMethod } from './package';

/**
 * An entry of the host's installed software list
 */
export type InstalledRecord = {
    id: string;
    installMethod: InstallMethod;
    displayName: string;
    displayVersion?: string;
    installationPath?: string;

    /** Windows Installer product code, when the record belongs to an MSI package */
    windowsInstallerId?: string;

    /** Registered uninstall command, used by non MSI uninstallers */
    uninstallString?: string;
}

/**
 * A previous installation of a package that may hold files the installer needs to replace
 */
export type PriorInstallation = {
    installationPath?: string;
}
