import type { Server } from '@modelcontextprotocol/sdk/server/index.js';
import {
    CallToolRequestSchema,
    ErrorCode,
    ListToolsRequestSchema,
    McpError,
} from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, ListToolsResult } from '@modelcontextprotocol/sdk/types.js';
import type { DesignStandardsService } from '../services/DesignStandardsService.js';
import { logger } from '../utils/logger.js';
import type { RegisteredServiceTool } from './serviceTool.js';
import searchDesignStandards from './searchDesignStandards.js';
import getArchitecturePatterns from './getArchitecturePatterns.js';
import getTechnologyStandards from './getTechnologyStandards.js';
import getSecurityGuidelines from './getSecurityGuidelines.js';

export const SERVICE_TOOLS: readonly RegisteredServiceTool[] = [
    searchDesignStandards,
    getArchitecturePatterns,
    getTechnologyStandards,
    getSecurityGuidelines,
];

const toolsByName = new Map(SERVICE_TOOLS.map(tool => [tool.definition.name, tool]));

export function listServiceTools(): ListToolsResult {
    return { tools: SERVICE_TOOLS.map(tool => tool.definition) };
}

/**
 * Routes a CallTool request to the named service operation.
 * @throws McpError MethodNotFound for an unknown tool, InvalidParams for bad arguments.
 */
export async function callServiceTool(name: string, args: unknown, service: DesignStandardsService): Promise<CallToolResult> {
    const tool = toolsByName.get(name);
    if (!tool) {
        throw new McpError(ErrorCode.MethodNotFound, `Tool "${name}" not found.`);
    }
    return tool.call(args, service);
}

/**
 * Registers the ListTools and CallTool handlers for the service operations
 * on an MCP server instance.
 */
export function registerTools(server: Server, service: DesignStandardsService): void {
    server.setRequestHandler(ListToolsRequestSchema, async () => {
        logger.debug('Received ListTools request.');
        return listServiceTools();
    });

    server.setRequestHandler(CallToolRequestSchema, async (request) => {
        logger.debug(`Received CallTool request for: ${request.params.name}`);
        return callServiceTool(request.params.name, request.params.arguments, service);
    });
}
