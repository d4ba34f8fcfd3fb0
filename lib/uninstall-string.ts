/**
 * Splits a registered uninstall command into the executable and its argument string
 */
export function parseUninstallString(uninstallString: string): { executable: string; args: string } {
    const trimmed = uninstallString.trim();

    if (trimmed.startsWith('"')) {
        const endQuote = trimmed.indexOf('"', 1);
        if (endQuote === -1) {
            return { executable: trimmed.substring(1), args: '' };
        }
        return {
            executable: trimmed.substring(1, endQuote),
            args: trimmed.substring(endQuote + 1).trim(),
        };
    }

    const match = trimmed.match(/^(.+?\.(?:exe|bat|cmd))(?:\s+(.*))?$/i);
    if (match) {
        return { executable: match[1], args: (match[2] ?? '').trim() };
    }

    const spaceIdx = trimmed.indexOf(' ');
    return spaceIdx === -1
        ? { executable: trimmed, args: '' }
        : { executable: trimmed.substring(0, spaceIdx), args: trimmed.substring(spaceIdx + 1).trim() };
}
