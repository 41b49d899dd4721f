/**
 * MCP server entry point
 */

import { loadConfig, loadDotenv } from "../config";
import { createServices } from "../services";
import { runStdioServer } from "./server";
import { errorMessage } from "../errors";
import Logger from "../utils/logger";

const logger = Logger.getInstance();

async function main(): Promise<void> {
    loadDotenv();
    const config = loadConfig();
    logger.setLevel(config.logLevel);
    const services = await createServices(config, { requireInference: true });
    await runStdioServer(services.retrieval);
}

main().catch((error: unknown) => {
    logger.error(`Fatal error: ${errorMessage(error)}`);
    process.exit(1);
});
