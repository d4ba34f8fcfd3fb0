import { ConsoleLogger, ILogger } from './interfaces/logger-interface';
import { InstallerArgs, InteractivityLevel } from './models';

/**
 * Whether the package or the adapter declares a template for the given level.
 * An empty template still counts: it means "no extra flags needed".
 */
export function supportsLevel(
    level: InteractivityLevel,
    packageArgs: InstallerArgs | undefined,
    adapterArgs: InstallerArgs,
): boolean {
    if (level === 'interactive') {
        return true;
    }
    return packageArgs?.[level] !== undefined || adapterArgs[level] !== undefined;
}

/**
 * Maps the requested interactivity level to one the installer actually supports.
 * Silent falls back to passive, passive to silent, and both to interactive.
 */
export function resolveInteractivity(
    requested: InteractivityLevel,
    packageArgs: InstallerArgs | undefined,
    adapterArgs: InstallerArgs,
    logger: ILogger = new ConsoleLogger(),
): InteractivityLevel {
    if (requested === 'interactive' || supportsLevel(requested, packageArgs, adapterArgs)) {
        return requested;
    }

    const alternative: InteractivityLevel = requested === 'silent' ? 'passive' : 'silent';

    if (supportsLevel(alternative, packageArgs, adapterArgs)) {
        logger.info(`${capitalize(requested)} install is not supported by installer. Switching to ${capitalize(alternative)}`);
        return alternative;
    }

    logger.warn('Silent or Passive install is not supported by installer. Switching to Interactive');
    return 'interactive';
}

function capitalize(level: InteractivityLevel): string {
    return level.charAt(0).toUpperCase() + level.slice(1);
}
