import { exec } from 'child_process';
import { promisify } from 'util';

const execAsync = promisify(exec);

/**
 * Shell access (PowerShell registry queries, process control) abstraction interface for testability
 */
export interface IShell {
    exec(command: string): Promise<{ stdout: string; stderr: string }>;
}

/**
 * Default implementation using Node.js child_process.exec
 */
export class NodeShell implements IShell {
    async exec(command: string): Promise<{ stdout: string; stderr: string }> {
        return execAsync(command, { maxBuffer: 16 * 1024 * 1024 });
    }
}
