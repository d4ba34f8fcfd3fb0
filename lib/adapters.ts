import { AdapterNotFoundError, DuplicateAdapterError } from './errors';
import { InitializedAdapter, InstallerAdapter, InstallerArgs, InstallMethod } from './models';
import { LOG_PATH_PLACEHOLDER } from './arguments';

const TEMPLATE_KEYS: readonly (keyof InstallerArgs)[] = ['silent', 'interactive', 'passive', 'log'];

/**
 * Adapters for one kind of operation, keyed by install method.
 * Each install method may be claimed by exactly one adapter.
 */
export class AdapterRegistry<TTarget> {
    private readonly adapters = new Map<InstallMethod, InstallerAdapter<TTarget>>();

    constructor(
        private readonly operation: 'install' | 'uninstall',
        adapters: InstallerAdapter<TTarget>[] = [],
    ) {
        adapters.forEach(adapter => this.register(adapter));
    }

    register(adapter: InstallerAdapter<TTarget>): void {
        if (this.adapters.has(adapter.installMethod)) {
            throw new DuplicateAdapterError(adapter.installMethod);
        }
        this.adapters.set(adapter.installMethod, adapter);
    }

    find(installMethod: InstallMethod): InstallerAdapter<TTarget> | undefined {
        return this.adapters.get(installMethod);
    }

    get(installMethod: InstallMethod): InstallerAdapter<TTarget> {
        const adapter = this.find(installMethod);
        if (!adapter) {
            throw new AdapterNotFoundError(installMethod, this.operation);
        }
        return adapter;
    }

    installMethods(): InstallMethod[] {
        return Array.from(this.adapters.keys());
    }
}

/**
 * Replaces `{name}` tokens with the given values. Unknown tokens and the log `{path}` are left alone.
 */
export function substitutePlaceholders(template: string, values: Record<string, string>): string {
    return template.replace(/\{(\w+)\}/g, (token: string, name: string) => {
        if (token === LOG_PATH_PLACEHOLDER || !Object.prototype.hasOwnProperty.call(values, name)) {
            return token;
        }
        return values[name];
    });
}

/**
 * Binds an adapter to the installer file or installed record it will run against
 */
export function initializeAdapter<TTarget>(adapter: InstallerAdapter<TTarget>, target: TTarget): InitializedAdapter {
    const values = adapter.placeholders?.(target) ?? {};
    const args: InstallerArgs = {};

    for (const key of TEMPLATE_KEYS) {
        const template = adapter.args[key];
        if (template !== undefined) {
            args[key] = substitutePlaceholders(template, values);
        }
    }

    return {
        installMethod: adapter.installMethod,
        args,
        exitCodes: adapter.exitCodes,
        executablePath: adapter.processPath(target),
    };
}
