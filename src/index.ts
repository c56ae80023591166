#!/usr/bin/env node
// silence-trim - trim trailing silence from videos, or split them at silences
import { hideBin } from 'yargs/helpers';
import { runCli } from './cli';

async function main() {
    process.exitCode = await runCli(hideBin(process.argv));
}

main().catch((error) => {
    console.error(error);
    process.exit(1);
});
