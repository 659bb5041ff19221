#!/usr/bin/env node
import { loadConfig } from "./config.js";
import { createMailstoreCore } from "./core.js";
import { Logger, describeError } from "./logger.js";

async function main() {
    const config = loadConfig();
    const core = createMailstoreCore(config);

    const stop = (signal: string) => {
        Logger.info(`Received ${signal}, shutting down`, { facility: "server" });
        core.stop();
    };
    process.once("SIGINT", () => stop("SIGINT"));
    process.once("SIGTERM", () => stop("SIGTERM"));

    Logger.info("Mail store core starting", {
        facility: "server",
        database: `${config.database.host}:${config.database.port}/${config.database.database}`,
    });
    await core.start();
    Logger.info("Mail store core stopped", { facility: "server" });
}

main().catch((error: unknown) => {
    Logger.disaster(`Mail store core failed: ${describeError(error)}`, { facility: "server" });
    process.exitCode = 1;
});
