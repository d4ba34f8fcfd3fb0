import { spawn, ChildProcess, StdioOptions } from 'child_process';

export type SpawnOptions = {
    stdio?: StdioOptions;
    shell?: boolean;

    /** Hand the arguments to the process exactly as given, without Windows quoting */
    windowsVerbatimArguments?: boolean;
}

/**
 * The part of a spawned process the runner listens to
 */
export interface ProcessHandle {
    on(event: 'close', listener: (code: number | null, signal: NodeJS.Signals | null) => void): this;
    on(event: 'error', listener: (error: Error) => void): this;
}

/**
 * Process controller abstraction interface for testability
 */
export interface IProcessController {
    start(command: string, args: string[], options?: SpawnOptions): ProcessHandle;
}

/**
 * Default implementation using Node.js child_process
 */
export class NodeProcessController implements IProcessController {
    start(command: string, args: string[], options?: SpawnOptions): ChildProcess {
        return spawn(command, args, options ?? {});
    }
}
