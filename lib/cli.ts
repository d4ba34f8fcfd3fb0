import * as readline from 'readline';
import { ChatLoopOptions, ParsedCommand } from './models';

export type { ChatLoopOptions };

/**
 * Parses a command line string into command, arguments and flags.
 * Handles quoted strings for arguments with spaces; anything starting with "-" is a flag.
 */
export function parseCommand(input: string): ParsedCommand {
    const trimmed = input.trim();
    if (!trimmed) {
        return { command: '', args: [], flags: [] };
    }

    const parts: string[] = [];
    let current = '';
    let inQuotes = false;

    for (const char of trimmed) {
        if (char === '"' || char === "'") {
            inQuotes = !inQuotes;
        } else if (char === ' ' && !inQuotes) {
            if (current) {
                parts.push(current);
                current = '';
            }
        } else {
            current += char;
        }
    }
    if (current) {
        parts.push(current);
    }

    const [command = '', ...rest] = parts;
    return {
        command: command.toLowerCase(),
        args: rest.filter(part => !part.startsWith('-')),
        flags: rest.filter(part => part.startsWith('-')),
    };
}

/**
 * Creates and runs a chat loop
 * @param commandExecutor Function that executes commands and returns whether to continue
 * @param options Configuration options for the chat loop
 */
export function createChatLoop(
    commandExecutor: (parsed: ParsedCommand) => Promise<boolean>,
    options: ChatLoopOptions = {},
): readline.Interface {
    const { prompt = '> ', welcomeMessage, onExit, input = process.stdin, output = process.stdout } = options;

    const rl = readline.createInterface({ input, output, prompt });

    if (welcomeMessage) {
        console.log(welcomeMessage);
    }

    rl.prompt();

    rl.on('line', (line: string) => {
        // Pause so a long running installer does not queue further input behind it
        rl.pause();
        commandExecutor(parseCommand(line))
            .then((shouldContinue) => {
                if (!shouldContinue) {
                    rl.close();
                    return;
                }
                console.log();
                rl.prompt();
            })
            .catch((error: unknown) => {
                console.error('Error:', error);
                console.log();
                rl.prompt();
            });
    });

    rl.on('close', () => {
        onExit?.();
    });

    return rl;
}
