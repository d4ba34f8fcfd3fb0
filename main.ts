#!/usr/bin/env node
import { createChatLoop, parseCommand } from './lib/cli';
import { createCommandRouter } from './lib/command-router';
import { loadCatalog } from './lib/catalog';
import { loadConfig } from './lib/config';
import { errorMessage } from './lib/errors';
import { createDefaultDependencies, InstallService } from './lib/service';
import { CliProgressBarFactory } from './lib/ui';

async function main(argv: string[]): Promise<void> {
    const config = loadConfig();
    const deps = createDefaultDependencies(config, { progressBarFactory: new CliProgressBarFactory() });
    const router = createCommandRouter({
        service: new InstallService(deps),
        catalog: loadCatalog(config.catalogPath),
        recordSource: deps.recordSource,
        defaultInteractivity: config.interactivity,
    });

    // One-shot mode: `setup-conductor install sample-msi-tool`
    if (argv.length > 0) {
        const quoted = argv.map(arg => (arg.includes(' ') ? `"${arg}"` : arg)).join(' ');
        await router(parseCommand(quoted));
        return;
    }

    createChatLoop(router, {
        prompt: '> ',
        welcomeMessage: 'Setup Conductor\nType "help" for available commands or "exit" to quit.\n',
        onExit: () => {
            process.exit(0);
        },
    });
}

main(process.argv.slice(2))
    .catch((error: unknown) => {
        console.error(`Error: ${errorMessage(error)}`);
        process.exitCode = 1;
    });
