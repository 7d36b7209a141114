import { Server as McpServer } from '@modelcontextprotocol/sdk/server/index.js';
import type { ServerOptions } from '@modelcontextprotocol/sdk/server/index.js';
import type { DesignStandardsService } from '../services/DesignStandardsService.js';
import { registerTools } from '../tools/index.js';
import { logger } from '../utils/logger.js';

export const SERVER_INFO = { name: 'design-standards-agent', version: '0.1.0' };

/**
 * Creates an MCP server exposing the design standards operations.
 * Each transport connection gets its own instance; they share the service.
 */
export function createMcpServer(service: DesignStandardsService): McpServer {
    const serverOptions: ServerOptions = {
        capabilities: {
            tools: {}
        }
    };
    const mcpServer = new McpServer(SERVER_INFO, serverOptions);
    registerTools(mcpServer, service);

    mcpServer.onerror = (error) => {
        logger.error(`[McpServer Error] ${error.message}`);
    };
    return mcpServer;
}
