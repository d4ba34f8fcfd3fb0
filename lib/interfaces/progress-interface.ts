import { ProgressBarProps } from '../models';

/**
 * Progress bar abstraction interface for testability
 */
export interface IProgressBar {
    setTotal(total: number): void;
    update(value: number): void;
    stop(): void;
}

export interface IProgressBarFactory {
    createBar(name: string, options?: ProgressBarProps): IProgressBar;
}
