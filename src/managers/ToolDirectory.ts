import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { StreamableHTTPClientTransport } from '@modelcontextprotocol/sdk/client/streamableHttp.js';
import { SSEClientTransport } from '@modelcontextprotocol/sdk/client/sse.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { Tool } from '@modelcontextprotocol/sdk/types.js';
import type { ConnectionConfig } from '../types/configTypes.js';
import type { InvocationOptions, RemoteTool, ToolDirectory } from '../types/toolTypes.js';
import { ConnectionError, DesignAgentError, ProtocolError, ToolInvocationError } from '../lib/errors.js';
import { logger } from '../utils/logger.js';

// Timeouts for listing and calling tools on the remote endpoint
const DISCOVERY_TIMEOUT_MS = 10000; // 10 seconds
const CALL_TIMEOUT_MS = 30000; // 30 seconds

const CLIENT_INFO = { name: 'design-standards-agent', version: '0.1.0' };

export interface ToolDirectoryOptions {
    discoveryTimeoutMs?: number;
    callTimeoutMs?: number;
}

/**
 * MCP client for the remote architecture platform.
 *
 * Opens one connection lazily and keeps it for later listings and tool calls.
 * Concurrent queries share it. A connection that is closed or whose transport
 * fails is dropped so the next call reconnects; a request that times out or is
 * aborted fails on its own and leaves the connection to the others. Nothing is
 * retried within a call.
 */
export class McpToolDirectory implements ToolDirectory {
    private client: Client | null = null;
    private connecting: Promise<Client> | null = null;
    private readonly discoveryTimeoutMs: number;
    private readonly callTimeoutMs: number;

    constructor(private readonly connection: ConnectionConfig, options: ToolDirectoryOptions = {}) {
        this.discoveryTimeoutMs = options.discoveryTimeoutMs ?? DISCOVERY_TIMEOUT_MS;
        this.callTimeoutMs = options.callTimeoutMs ?? CALL_TIMEOUT_MS;
    }

    /**
     * Lists every tool the endpoint exposes, following pagination cursors.
     * @throws ConnectionError if the endpoint is unreachable or rejects the credentials.
     * @throws ProtocolError if the listing cannot be parsed into descriptors.
     */
    public async listTools(): Promise<RemoteTool[]> {
        const client = await this.getClient();
        const listed: Tool[] = [];

        try {
            const seenCursors = new Set<string>();
            let cursor: string | undefined;
            do {
                const page = await client.listTools(cursor ? { cursor } : {}, { timeout: this.discoveryTimeoutMs });
                if (!page || !Array.isArray(page.tools)) {
                    throw new ProtocolError('Invalid ListTools response format.');
                }
                listed.push(...page.tools);
                cursor = page.nextCursor;
                if (cursor !== undefined) {
                    if (seenCursors.has(cursor)) {
                        throw new ProtocolError(`ListTools returned cursor "${cursor}" twice.`);
                    }
                    seenCursors.add(cursor);
                }
            } while (cursor !== undefined);
        } catch (error: unknown) {
            throw await this.fail(client, error, 'ListTools');
        }

        const tools: RemoteTool[] = [];
        const names = new Set<string>();
        for (const toolSchema of listed) {
            if (names.has(toolSchema.name)) {
                logger.warn(`Tool "${toolSchema.name}" listed more than once by ${this.connection.serverLabel}. Keeping the first.`);
                continue;
            }
            names.add(toolSchema.name);
            tools.push(this.toRemoteTool(toolSchema));
        }

        logger.info(`Loaded ${tools.length} tools from ${this.connection.serverLabel}`);
        tools.forEach(tool => logger.debug(`- ${tool.name}: ${tool.description}`));
        return tools;
    }

    /**
     * Calls a remote tool and renders its content as text.
     * Text blocks are joined with newlines; other blocks are JSON-encoded.
     * @param options.signal Cancels the request when aborted.
     * @throws ToolInvocationError if the tool reports a failure.
     */
    public async callTool(name: string, args: Record<string, unknown>, options: InvocationOptions = {}): Promise<string> {
        const client = await this.getClient();
        logger.debug(`Calling remote tool ${name} on ${this.connection.serverLabel}`);

        const result = await client
            .callTool({ name, arguments: args }, undefined, { timeout: this.callTimeoutMs, signal: options.signal })
            .catch(async (error: unknown) => {
                throw await this.fail(client, error, `CallTool ${name}`, options.signal);
            });

        const content: unknown = 'content' in result ? result.content : undefined;
        if (!Array.isArray(content)) {
            throw new ProtocolError(`Tool "${name}" returned a result without content.`);
        }
        const text = renderContent(content);

        if ('isError' in result && result.isError === true) {
            throw new ToolInvocationError(name, text || `Tool "${name}" reported an error.`);
        }
        return text;
    }

    /**
     * Closes the connection, if one is open. Safe to call more than once.
     */
    public async close(): Promise<void> {
        const client = this.client;
        if (client) {
            await this.discard(client);
            logger.debug(`Closed connection to ${this.connection.serverLabel}`);
        }
    }

    private toRemoteTool(toolSchema: Tool): RemoteTool {
        return Object.freeze({
            name: toolSchema.name,
            description: toolSchema.description ?? '',
            parameterSchema: Object.freeze({ ...toolSchema.inputSchema }),
            invoke: (args: Record<string, unknown>, options?: InvocationOptions) => this.callTool(toolSchema.name, args, options),
        });
    }

    /**
     * Returns the open client, connecting first if needed.
     * Concurrent callers share a single connection attempt.
     */
    private async getClient(): Promise<Client> {
        if (this.client) {
            return this.client;
        }
        if (!this.connecting) {
            this.connecting = this.connect().finally(() => {
                this.connecting = null;
            });
        }
        return this.connecting;
    }

    private async connect(): Promise<Client> {
        const { serverLabel, endpointUrl, transportKind } = this.connection;
        logger.info(`Connecting to ${serverLabel} at ${endpointUrl} (${transportKind})`);

        const client = new Client(CLIENT_INFO, { capabilities: {} });
        try {
            await client.connect(this.createTransport());
        } catch (error: unknown) {
            await client.close().catch((err: Error) => logger.warn(`Error closing failed client for ${serverLabel}: ${err.message}`));
            throw this.classify(error, 'connect');
        }

        client.onclose = () => {
            if (this.client === client) {
                logger.info(`Connection to ${serverLabel} closed.`);
                this.client = null;
            }
        };
        this.client = client;
        return client;
    }

    private createTransport(): Transport {
        const url = new URL(this.connection.endpointUrl);
        const headers: Record<string, string> = {};
        if (this.connection.authToken) {
            headers['Authorization'] = `Bearer ${this.connection.authToken}`;
        }
        const requestInit = { headers };

        return this.connection.transportKind === 'sse'
            ? new SSEClientTransport(url, { requestInit })
            : new StreamableHTTPClientTransport(url, { requestInit });
    }

    /**
     * Classifies a failure and drops the connection when it is no longer usable.
     * Timeouts and aborts belong to one request, so the shared client is kept.
     */
    private async fail(client: Client, error: unknown, action: string, signal?: AbortSignal): Promise<DesignAgentError> {
        const failure = this.classify(error, action);
        if (!signal?.aborted && isConnectionLost(error)) {
            await this.discard(client);
        }
        return failure;
    }

    private classify(error: unknown, action: string): DesignAgentError {
        const label = this.connection.serverLabel;
        if (error instanceof DesignAgentError) {
            return error;
        }
        if (error instanceof Error && error.name === 'ZodError') {
            return new ProtocolError(`${label} sent a malformed response to ${action}.`, { cause: error });
        }
        if (error instanceof McpError) {
            if (error.code === ErrorCode.ConnectionClosed || error.code === ErrorCode.RequestTimeout) {
                return new ConnectionError(`${action} on ${label} failed: ${error.message}`, { cause: error });
            }
            return new ProtocolError(`${label} rejected ${action}: ${error.message}`, { cause: error });
        }
        const message = error instanceof Error ? error.message : String(error);
        return new ConnectionError(`Could not ${action === 'connect' ? 'connect to' : `complete ${action} on`} ${label} at ${this.connection.endpointUrl}: ${message}`, { cause: error });
    }

    private async discard(client: Client): Promise<void> {
        if (this.client === client) {
            this.client = null;
        }
        await client.close().catch((err: Error) => logger.warn(`Error closing client for ${this.connection.serverLabel}: ${err.message}`));
    }
}

/**
 * True for failures that leave the client unusable: a closed connection or a
 * transport error. MCP error replies, timeouts and malformed responses are not.
 */
function isConnectionLost(error: unknown): boolean {
    if (error instanceof McpError) {
        return error.code === ErrorCode.ConnectionClosed;
    }
    if (error instanceof DesignAgentError) {
        return false;
    }
    return !(error instanceof Error && error.name === 'ZodError');
}

function isTextBlock(block: unknown): block is { type: 'text'; text: string } {
    return typeof block === 'object' && block !== null
        && 'type' in block && block.type === 'text'
        && 'text' in block && typeof block.text === 'string';
}

function renderContent(blocks: unknown[]): string {
    return blocks
        .map(block => isTextBlock(block) ? block.text : JSON.stringify(block))
        .join('\n');
}
