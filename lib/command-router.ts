import { errorMessage } from './errors';
import { CommandContext, installPackages, listInstalled, listPackages, uninstallPackages } from './commands';
import { InteractivityLevel, ParsedCommand } from './models';

/**
 * Checks if help flag is present in flags
 */
function hasHelpFlag(flags: string[]): boolean {
    return flags.includes('-h') || flags.includes('--help');
}

/**
 * Reads --silent / --passive / --interactive; the last one given wins
 */
export function interactivityFromFlags(flags: string[], fallback: InteractivityLevel): InteractivityLevel {
    let level = fallback;
    for (const flag of flags) {
        if (flag === '--silent' || flag === '-s') level = 'silent';
        else if (flag === '--passive' || flag === '-p') level = 'passive';
        else if (flag === '--interactive' || flag === '-i') level = 'interactive';
    }
    return level;
}

/**
 * Creates the executor for the interactive loop.
 * The executor resolves to false when the loop should end.
 */
export function createCommandRouter(context: CommandContext): (parsed: ParsedCommand) => Promise<boolean> {
    return async ({ command, args, flags }: ParsedCommand): Promise<boolean> => {
        try {
            switch (command) {
                case 'install':
                case 'i': {
                    if (hasHelpFlag(flags) || args.length === 0) {
                        printInstallHelp();
                        return true;
                    }
                    const installed = await installPackages(context, args, interactivityFromFlags(flags, context.defaultInteractivity));
                    if (!installed) process.exitCode = 1;
                    return true;
                }

                case 'uninstall':
                case 'u': {
                    if (hasHelpFlag(flags) || args.length === 0) {
                        printUninstallHelp();
                        return true;
                    }
                    const uninstalled = await uninstallPackages(context, args, interactivityFromFlags(flags, context.defaultInteractivity));
                    if (!uninstalled) process.exitCode = 1;
                    return true;
                }

                case 'list':
                case 'ls':
                    listPackages(context.catalog);
                    return true;

                case 'list-installed':
                case 'li':
                    await listInstalled(context.recordSource, args[0]);
                    return true;

                case 'help':
                    printHelp();
                    return true;

                case 'exit':
                case 'quit':
                case 'q':
                    console.log('Goodbye!');
                    return false;

                case 'clear':
                case 'cls':
                    console.clear();
                    return true;

                default:
                    if (command) {
                        console.error(`Unknown command: ${command}`);
                        console.log('Type "help" for usage information.');
                    } else if (hasHelpFlag(flags)) {
                        printHelp();
                    }
                    return true;
            }
        } catch (error) {
            console.error(`Error: ${errorMessage(error)}`);
            return true;
        }
    };
}

const LEVEL_OPTIONS = `Options:
  --silent, -s        No installer UI (default unless configured otherwise)
  --passive, -p       Progress UI only, no prompts
  --interactive, -i   Full installer UI

Unsupported levels fall back: silent to passive, passive to silent, then interactive.`;

function printInstallHelp(): void {
    console.log(`
install, i - Download and install packages from the catalog

Usage:
  install <package-ids...> [options]

${LEVEL_OPTIONS}

Examples:
  install sample-msi-tool
  install sample-msi-tool sample-inno-player --passive
`);
}

function printUninstallHelp(): void {
    console.log(`
uninstall, u - Uninstall installed programs

Usage:
  uninstall <names...> [options]

${LEVEL_OPTIONS}

A name must match exactly one installed program (case and punctuation are ignored).
If it matches several, they are listed and nothing is uninstalled.

Examples:
  uninstall "Sample NSIS Editor"
  uninstall sample-inno-player --interactive
`);
}

/**
 * Prints help information for all available commands
 */
export function printHelp(): void {
    console.log(`
Setup Conductor - CLI Commands

Commands:
  install, i <ids...>         Download and install catalog packages
  uninstall, u <names...>     Uninstall installed programs
  list, ls                    List catalog packages
  list-installed, li [text]   List installed programs, optionally filtered
  help                        Show this help message
                              Use [command] --help for command-specific help
  exit, quit, q               Exit the interactive mode
  clear, cls                  Clear the console

${LEVEL_OPTIONS}
`);
}
