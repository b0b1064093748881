#!/usr/bin/env node
/**
 * @module bin
 * @description Executable entry of the `radar-sdk` command
 */

import { runCli } from './src/cli';

runCli(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error instanceof Error ? error.message : String(error));
        process.exitCode = 1;
    }
);
