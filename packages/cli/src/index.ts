#!/usr/bin/env node

import { runCli } from "./cli";

// inquirer re-raises Ctrl+C as SIGINT once it has restored the terminal
process.on("SIGINT", () => {
    console.error("\nCancelled");
    process.exit(130);
});

runCli(process.argv.slice(2))
    .then((exitCode) => {
        process.exitCode = exitCode;
    })
    .catch((error) => {
        console.error("Fatal error:", error);
        process.exit(1);
    });
