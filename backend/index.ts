#!/usr/bin/env node
import { main } from "./cli.js";

try {
    process.exitCode = await main(process.argv.slice(2));
} catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    console.error(message);
    process.exitCode = 1;
}
