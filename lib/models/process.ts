/**
 * Options for running a single installer/uninstaller process
 */
export type RunProcessOptions = {
    /** Called every 100ms while waiting for the process */
    onProgress?: (elapsed: number) => void;
}

/**
 * Classified outcome of an installer run
 */
export type RunResult = {
    success: boolean;
    exitCode: number;
    reason?: string;

    /** Only set when the installer was told to write a log file */
    logPath?: string;
}
