#!/usr/bin/env node
/**
 * apiweave — executable entry point
 *
 * @module
 */
import { run } from './cli.js';

run(process.argv).then(
    (code) => { process.exitCode = code; },
    (err: unknown) => {
        console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
        process.exitCode = 1;
    },
);
