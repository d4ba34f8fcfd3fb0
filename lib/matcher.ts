import { IRecordMatcher } from './interfaces/collaborator-interfaces';
import { InstalledRecord } from './models';

/**
 * Lowercases and drops everything but letters and digits, so "Sample Tool" matches "sample-tool"
 */
export function normalizeName(name: string): string {
    return name.toLowerCase().replace(/[^a-z0-9]/g, '');
}

/**
 * Matches records whose display name equals or contains the requested id
 */
export class NameRecordMatcher implements IRecordMatcher {
    async matchFor(records: InstalledRecord[], packageId: string): Promise<InstalledRecord[]> {
        const target = normalizeName(packageId);
        if (!target) {
            return [];
        }

        return records.filter(record => normalizeName(record.displayName).includes(target));
    }
}
