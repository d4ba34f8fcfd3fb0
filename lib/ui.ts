import * as cliProgress from 'cli-progress';
import { IProgressBar, IProgressBarFactory } from './interfaces/progress-interface';
import { InstalledRecord, ProgressBarProps } from './models';

/**
 * Wrapper for cli-progress progress bar to match our interface
 */
class CliProgressBarWrapper implements IProgressBar {
    constructor(private readonly bar: cliProgress.SingleBar) {}

    setTotal(total: number): void {
        this.bar.setTotal(total);
    }

    update(value: number): void {
        this.bar.update(value);
    }

    stop(): void {
        this.bar.stop();
    }
}

/**
 * Default progress bar factory implementation
 */
export class CliProgressBarFactory implements IProgressBarFactory {
    createBar(name: string, options?: ProgressBarProps): IProgressBar {
        const bar = new cliProgress.SingleBar({
            format: options?.format ?? '{name} |{bar}| {percentage}% | {value}/{total} bytes | ETA: {eta}s',
            barCompleteChar: options?.barCompleteChar ?? '█',
            barIncompleteChar: options?.barIncompleteChar ?? '░',
            hideCursor: options?.hideCursor ?? true,
            clearOnComplete: options?.clearOnComplete ?? true,
            stopOnComplete: options?.stopOnComplete ?? true,
        }, options?.preset ?? cliProgress.Presets.shades_classic);

        bar.start(0, 0, { name });
        return new CliProgressBarWrapper(bar);
    }
}

export type Status = 'completed' | 'failed' | 'skipped';

const STATUS_ICONS: Record<Status, string> = {
    completed: '✓',
    failed: '✗',
    skipped: '⊘',
};

export function formatStatusLine(status: Status, name: string, detail?: string): string {
    const line = `  ${STATUS_ICONS[status]} ${name.padEnd(25)}`;
    return detail ? `${line} ${detail}` : line.trimEnd();
}

/**
 * Numbered list of installed records, one per line
 */
export function formatRecordList(records: InstalledRecord[]): string[] {
    return records.map((record, index) => {
        const version = record.displayVersion ? ` ${record.displayVersion}` : '';
        return `  ${index + 1}. ${record.displayName}${version} [${record.installMethod}]`;
    });
}
