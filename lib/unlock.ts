import { errorMessage } from './errors';
import { IUnlocker } from './interfaces/collaborator-interfaces';
import { ConsoleLogger, ILogger } from './interfaces/logger-interface';
import { IShell, NodeShell } from './interfaces/shell-interface';
import { InstallMethod } from './models';

/**
 * Stops processes running from an installation folder so their files can be replaced
 */
export class PowerShellUnlocker implements IUnlocker {
    constructor(
        private readonly shell: IShell = new NodeShell(),
        private readonly logger: ILogger = new ConsoleLogger(),
    ) {}

    async unlock(folder: string, installMethod: InstallMethod): Promise<void> {
        // Windows Installer closes or schedules in-use files itself through the Restart Manager
        if (installMethod === 'msi') {
            this.logger.debug(`Leaving ${folder} to the Windows Installer restart manager`);
            return;
        }

        const trimmed = folder.replace(/[\\/]+$/, '');
        // A drive root or a bare name would match nearly every running process
        if (trimmed.split(/[\\/]+/).filter(part => part !== '').length < 2) {
            this.logger.warn(`Refusing to unlock ${folder}: not an installation folder`);
            return;
        }

        // Literal prefix match: folder names may contain [ and ]
        const prefix = `${trimmed}\\`.replace(/'/g, "''");
        const command = `powershell -NoProfile -Command "Get-Process | Where-Object { $_.Path -and $_.Path.StartsWith('${prefix}', [System.StringComparison]::OrdinalIgnoreCase) } | Stop-Process -Force -ErrorAction SilentlyContinue"`;

        try {
            await this.shell.exec(command);
            this.logger.debug(`Released processes running from ${folder}`);
        } catch (error) {
            this.logger.warn(`Could not unlock ${folder}: ${errorMessage(error)}`);
        }
    }
}
