import type { Server as McpServer } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { DesignStandardsService } from '../services/DesignStandardsService.js';
import { logger } from '../utils/logger.js';
import { createMcpServer } from './createMcpServer.js';
import type { ServiceInterface } from './ServiceInterface.js';

/**
 * Serves the design standards operations to a single MCP client over stdin/stdout.
 */
export class StdioInterface implements ServiceInterface {
    private mcpServer: McpServer;

    constructor(service: DesignStandardsService) {
        this.mcpServer = createMcpServer(service);
    }

    public async start(): Promise<void> {
        try {
            const transport = new StdioServerTransport();
            // The connect method starts listening on the transport
            await this.mcpServer.connect(transport);
            logger.info('Design standards agent listening on STDIO.');
        } catch (error: unknown) {
            const message = error instanceof Error ? error.message : String(error);
            logger.error(`Failed to start STDIO interface: ${message}`);
            throw error;
        }
    }

    public async stop(): Promise<void> {
        logger.info('Stopping STDIO interface...');
        await this.mcpServer.close();
        logger.info('STDIO interface stopped.');
    }
}
