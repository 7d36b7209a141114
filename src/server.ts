import { ConfigurationManager } from './config/ConfigurationManager.js';
import { McpToolDirectory } from './managers/ToolDirectory.js';
import { QueryAgent } from './managers/QueryAgent.js';
import { LangGraphReasoningLoop } from './agent/LangGraphReasoningLoop.js';
import { DesignStandardsService } from './services/DesignStandardsService.js';
import { StreamableHttpInterface } from './interfaces/StreamableHttpInterface.js';
import { StdioInterface } from './interfaces/StdioInterface.js';
import type { ServiceInterface } from './interfaces/ServiceInterface.js';
import { ErrorHandler } from './lib/ErrorHandler.js';
import { logger } from './utils/logger.js';

// --- Main Application ---
async function main(): Promise<void> {
    logger.info('--- Design Standards Agent Starting ---');

    let service: DesignStandardsService | null = null;
    let serviceInterface: ServiceInterface | null = null;

    try {
        // 1. Load configuration once; everything below receives it explicitly
        const config = ConfigurationManager.fromProcessEnv().load();
        logger.setLevel(config.logLevel);

        // 2. Wire the query chain
        const directory = new McpToolDirectory(config.connection);
        const agent = new QueryAgent(new LangGraphReasoningLoop(), {
            timeoutMs: config.agent.timeoutMs,
            recursionLimit: config.agent.recursionLimit,
        });
        service = new DesignStandardsService(directory, agent, config.model);

        // 3. Start the request surface
        serviceInterface = config.service.transport === 'stdio'
            ? new StdioInterface(service)
            : new StreamableHttpInterface(service, config.service);
        await serviceInterface.start();

        logger.info(`Model: ${config.model.modelIdentifier}`);
        logger.info(`Remote platform: ${config.connection.endpointUrl} (${config.connection.transportKind})`);
        logger.info('--- Design Standards Agent Ready ---');
    } catch (error: unknown) {
        logger.error(`Fatal error during startup: ${ErrorHandler.describe(error)}`);
        await shutdown(serviceInterface, service, ErrorHandler.exitCodeFor(error));
        return;
    }

    // --- Graceful Shutdown Handling ---
    const handleShutdown = (signal: string) => {
        logger.info(`Received ${signal}. Shutting down gracefully...`);
        void shutdown(serviceInterface, service, 0);
    };

    process.on('SIGINT', () => handleShutdown('SIGINT'));
    process.on('SIGTERM', () => handleShutdown('SIGTERM'));
    process.on('unhandledRejection', (reason) => {
        logger.error('Unhandled Rejection:', reason);
        void shutdown(serviceInterface, service, 1);
    });
}

/**
 * Stops the request surface, closes the remote connection, and exits.
 */
async function shutdown(
    serviceInterface: ServiceInterface | null,
    service: DesignStandardsService | null,
    exitCode: number
): Promise<void> {
    logger.info('Initiating shutdown sequence...');
    try {
        await serviceInterface?.stop();
        await service?.close();
    } catch (error: unknown) {
        logger.error(`Error during shutdown: ${ErrorHandler.describe(error)}`);
        exitCode = exitCode || 1;
    } finally {
        logger.info(`--- Design Standards Agent Exiting (Code: ${exitCode}) ---`);
        process.exit(exitCode);
    }
}

// --- Run Main ---
main().catch(async (error: unknown) => {
    logger.error(`Unhandled error in main function: ${ErrorHandler.describe(error)}`);
    await shutdown(null, null, 1);
});
