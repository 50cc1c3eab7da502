#!/usr/bin/env node
import 'dotenv/config';
import { handleHelpCli, handleRunCli, handleServeCli, handleUnknownCommand } from './core/cli.js';
import { describeError } from './types/errors.js';

async function main(): Promise<void> {
    const argv = process.argv.slice(2);

    if (handleHelpCli(argv) || handleUnknownCommand(argv)) {
        return;
    }

    // serve keeps the process alive through its listening socket
    if (argv[0] === 'serve') {
        await handleServeCli(argv);
        return;
    }

    await handleRunCli(argv);
}

main().catch((err: unknown) => {
    console.error(`[Smoke] Fatal: ${describeError(err)}`);
    process.exitCode = 1;
});
