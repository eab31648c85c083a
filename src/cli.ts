#!/usr/bin/env node
import { logger } from "./logger.js";
import { runCli } from "./program.js";

runCli(process.argv.slice(2))
    .then((code) => {
        process.exitCode = code;
    })
    .catch((err: unknown) => {
        logger.error({ err }, "resize-1024 failed");
        process.exitCode = 1;
    });
