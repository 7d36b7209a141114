import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { logger } from '../utils/logger.js';
import { DesignAgentError, InvalidArgumentError } from './errors.js';

// Exit codes used by the single-shot CLI.
export const EXIT_FAILURE = 1;
export const EXIT_CONFIGURATION = 2;
export const EXIT_USAGE = 64;

/**
 * Converts errors raised inside the agent into the shapes each request
 * surface reports: MCP errors, failed tool results, and process exit codes.
 */
export class ErrorHandler {

    /**
     * Renders an error and its cause chain on one line, e.g.
     * `AgentError: Reasoning loop failed (caused by: Error: rate limited)`.
     */
    static describe(error: unknown): string {
        if (!(error instanceof Error)) {
            return String(error);
        }
        const head = `${error.name}: ${error.message}`;
        return error.cause === undefined ? head : `${head} (caused by: ${ErrorHandler.describe(error.cause)})`;
    }

    /**
     * Converts any error into an McpError for a JSON-RPC error response.
     * @param context Optional context string (e.g., the operation being performed).
     */
    static toMcpError(error: unknown, context?: string): McpError {
        const prefix = context ? `[${context}] ` : '';

        if (error instanceof McpError) {
            logger.warn(`${prefix}Encountered McpError: ${error.code} - ${error.message}`);
            return error;
        }
        if (error instanceof InvalidArgumentError) {
            return new McpError(ErrorCode.InvalidParams, `${prefix}${error.message}`);
        }
        if (error instanceof Error) {
            logger.error(`${prefix}${ErrorHandler.describe(error)}`);
            return new McpError(ErrorCode.InternalError, `${prefix}${error.message}`, { errorName: error.name });
        }

        logger.error(`${prefix}Encountered unknown error type:`, error);
        return new McpError(ErrorCode.InternalError, `${prefix}An unknown error occurred`, { originalError: String(error) });
    }

    /**
     * Builds the failed tool result a service operation returns when a query
     * cannot be answered. The caller sees the failure; it never gets an empty answer.
     */
    static toToolErrorResult(error: unknown): CallToolResult {
        const message = error instanceof Error ? error.message : String(error);
        return {
            content: [{ type: 'text', text: `Error querying the architecture platform: ${message}` }],
            isError: true,
        };
    }

    static exitCodeFor(error: unknown): number {
        if (error instanceof DesignAgentError) {
            switch (error.kind) {
                case 'configuration':
                    return EXIT_CONFIGURATION;
                case 'invalid_argument':
                    return EXIT_USAGE;
                default:
                    return EXIT_FAILURE;
            }
        }
        return EXIT_FAILURE;
    }
}
