export * from './models';
export * from './errors';
export * from './interfaces';
export { AdapterRegistry, initializeAdapter, substitutePlaceholders } from './adapters';
export { buildArguments, levelArguments, loggingTemplate, LOG_PATH_PLACEHOLDER } from './arguments';
export type { BuiltArguments } from './arguments';
export { resolveInteractivity, supportsLevel } from './interactivity';
export { runProcess } from './process';
export { classifyOutcome } from './outcome';
export { runInstaller } from './runner';
export type { RunnerDependencies } from './runner';
export { installPackage } from './install';
export type { InstallDependencies } from './install';
export { uninstallPackage, describeRecord } from './uninstall';
export type { UninstallDependencies } from './uninstall';
export { InstallService, createDefaultDependencies, createDefaultRegistries } from './service';
export type { ServiceDependencies } from './service';
export { EventHub } from './events';
export { loadConfig, ConfigError } from './config';
export type { AppConfig } from './config';
export { loadCatalog, parseCatalog, findPackage, CatalogError } from './catalog';
export { ArchitectureInstallerSelector } from './selector';
export { HttpTransferService } from './transfer';
export { RegistryInstalledRecordSource, RegistryPriorInstallationLookup } from './installed-records';
export { NameRecordMatcher } from './matcher';
export { PowerShellUnlocker } from './unlock';
export { PathResolver } from './paths';
export { installAdapters, uninstallAdapters } from '../data/installers';
