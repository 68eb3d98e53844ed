#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { errorMessage } from "@gridshift/shared";
import { printHelp } from "./command/help-command.js";
import { run } from "./run.js";

process.exitCode = await run(process.argv.slice(2)).catch((error: unknown) => {
    console.error(`[Error]: ${errorMessage(error)}`);
    printHelp();
    return 1;
});
