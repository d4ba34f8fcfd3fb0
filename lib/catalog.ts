import * as fs from 'fs';
import { z } from 'zod';
import bundledCatalog from '../data/packages.json';
import { errorMessage } from './errors';
import { ARCHITECTURES, INSTALL_METHODS, PackageDescriptor } from './models';

const installerArgsSchema = z.object({
    silent: z.string().optional(),
    interactive: z.string().optional(),
    passive: z.string().optional(),
    log: z.string().optional(),
}).strict();

const installerCandidateSchema = z.object({
    location: z.string().min(1),
    sha256: z.string().regex(/^[a-f0-9]{64}$/i, 'must be a hex encoded SHA-256 digest'),
    architecture: z.enum(ARCHITECTURES).optional(),
});

export const packageSchema = z.object({
    id: z.string().min(1),
    name: z.string().min(1),
    version: z.string().optional(),
    installMethod: z.enum(INSTALL_METHODS),
    installers: z.array(installerCandidateSchema).min(1),
    args: installerArgsSchema.optional(),
});

export const catalogSchema = z.object({
    packages: z.array(packageSchema),
}).superRefine((catalog, ctx) => {
    const seen = new Set<string>();
    catalog.packages.forEach((pkg, index) => {
        const id = pkg.id.toLowerCase();
        if (seen.has(id)) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['packages', index, 'id'],
                message: `Duplicate package id '${pkg.id}'`,
            });
        }
        seen.add(id);
    });
});

export class CatalogError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'CatalogError';
    }
}

export function parseCatalog(data: unknown): PackageDescriptor[] {
    const result = catalogSchema.safeParse(data);
    if (!result.success) {
        const details = result.error.issues
            .map(issue => `${issue.path.join('.')}: ${issue.message}`)
            .join('; ');
        throw new CatalogError(`Invalid package catalog: ${details}`);
    }
    return result.data.packages;
}

/**
 * Loads the package catalog from a JSON file, or the bundled one when no path is given
 */
export function loadCatalog(catalogPath?: string): PackageDescriptor[] {
    if (!catalogPath) {
        return parseCatalog(bundledCatalog);
    }

    let data: unknown;
    try {
        data = JSON.parse(fs.readFileSync(catalogPath, 'utf8'));
    } catch (error) {
        throw new CatalogError(`Could not read package catalog ${catalogPath}: ${errorMessage(error)}`);
    }
    return parseCatalog(data);
}

/**
 * Finds a package by id, case-insensitively
 */
export function findPackage(catalog: PackageDescriptor[], packageId: string): PackageDescriptor | undefined {
    const idLower = packageId.toLowerCase();
    return catalog.find(pkg => pkg.id.toLowerCase() === idLower);
}
