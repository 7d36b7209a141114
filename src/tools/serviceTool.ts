import { z } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { McpError, ErrorCode, ToolSchema } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import type { QueryResult } from '../types/agentTypes.js';
import type { DesignStandardsService } from '../services/DesignStandardsService.js';
import { InvalidArgumentError } from '../lib/errors.js';
import { ErrorHandler } from '../lib/ErrorHandler.js';
import { logger } from '../utils/logger.js';

/**
 * A service operation exposed over MCP. Tool modules export one of these
 * along with their Zod `inputSchema`.
 */
export interface ServiceTool<S extends z.AnyZodObject> {
    name: string;
    description: string;
    inputSchema: S;
    handler: (args: z.infer<S>, service: DesignStandardsService) => Promise<QueryResult>;
}

/**
 * A service tool ready to be listed and called, with its input schema
 * already converted to JSON Schema.
 */
export interface RegisteredServiceTool {
    readonly definition: Tool;
    call(args: unknown, service: DesignStandardsService): Promise<CallToolResult>;
}

/**
 * Converts a Zod input schema to the JSON Schema object MCP clients expect.
 * @throws Error if the schema does not describe an object.
 */
export function toInputSchema(schema: z.ZodTypeAny, toolName: string): Tool['inputSchema'] {
    const jsonSchema = zodToJsonSchema(schema, {
        target: 'jsonSchema7',
        $refStrategy: 'none',
    });
    const { $schema, ...withoutMeta } = jsonSchema;
    const parsed = ToolSchema.shape.inputSchema.safeParse(withoutMeta);
    if (!parsed.success) {
        throw new Error(`Input schema of tool ${toolName} is not a JSON Schema object (${$schema ?? 'no $schema'}): ${parsed.error.message}`);
    }
    return parsed.data;
}

/**
 * Validates arguments, runs the handler, and turns query failures into
 * `isError` results so the caller always sees why a query produced no answer.
 * Invalid or blank arguments become MCP InvalidParams errors instead.
 */
export function defineServiceTool<S extends z.AnyZodObject>(tool: ServiceTool<S>): RegisteredServiceTool {
    const definition: Tool = {
        name: tool.name,
        description: tool.description,
        inputSchema: toInputSchema(tool.inputSchema, tool.name),
    };

    return {
        definition,
        async call(args: unknown, service: DesignStandardsService): Promise<CallToolResult> {
            const parseResult = tool.inputSchema.safeParse(args ?? {});
            if (!parseResult.success) {
                const issues = parseResult.error.errors.map(e => `${e.path.join('.')}: ${e.message}`).join('; ');
                throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for tool ${tool.name}: ${issues}`);
            }

            try {
                const result = await tool.handler(parseResult.data, service);
                return { content: [{ type: 'text', text: result.finalText }] };
            } catch (error: unknown) {
                if (error instanceof InvalidArgumentError) {
                    throw ErrorHandler.toMcpError(error, tool.name);
                }
                logger.error(`Error in ${tool.name}: ${ErrorHandler.describe(error)}`);
                return ErrorHandler.toToolErrorResult(error);
            }
        },
    };
}
