#!/usr/bin/env node

import { runBatchCommand } from './batch/BatchCommand';

runBatchCommand(process.argv.slice(2)).then(
    (code) => {
        process.exitCode = code;
    },
    (error: unknown) => {
        console.error(error);
        process.exitCode = 1;
    }
);
