import * as http from 'http';
import { URL } from 'url';
import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import type { ServiceSettings } from '../types/configTypes.js';
import type { DesignStandardsService } from '../services/DesignStandardsService.js';
import { logger } from '../utils/logger.js';
import { createMcpServer } from './createMcpServer.js';
import type { ServiceInterface } from './ServiceInterface.js';

const HEALTH_PATH = '/health';

/**
 * Serves the design standards operations over stateless streamable HTTP.
 *
 * Every POST gets its own MCP server and transport, so concurrent queries
 * never share session state. GET and DELETE on the endpoint are rejected,
 * since there are no sessions to stream to or terminate.
 */
export class StreamableHttpInterface implements ServiceInterface {
    private httpServer: http.Server | null = null;

    constructor(private readonly service: DesignStandardsService, private readonly settings: ServiceSettings) { }

    /**
     * Starts the HTTP server. Resolves once it is listening.
     */
    public async start(): Promise<void> {
        if (this.httpServer) {
            logger.warn('Streamable HTTP server already running.');
            return;
        }
        const { host, port, path } = this.settings;

        const httpServer = http.createServer((req, res) => {
            this.handleHttpRequest(req, res).catch((error: unknown) => {
                const message = error instanceof Error ? error.message : String(error);
                logger.error(`Unhandled error serving ${req.method} ${req.url}: ${message}`);
                if (!res.headersSent) {
                    writeJsonRpcError(res, 500, ErrorCode.InternalError, 'Internal server error');
                }
            });
        });
        this.httpServer = httpServer;

        return new Promise((resolve, reject) => {
            httpServer.once('error', (err) => {
                logger.error(`Streamable HTTP server error: ${err.message}`);
                this.httpServer = null;
                reject(err);
            });
            httpServer.listen(port, host, () => {
                logger.info(`Design standards agent listening on http://${host}:${this.boundPort() ?? port}${path}`);
                resolve();
            });
        });
    }

    /**
     * The port the server is listening on, or null when stopped.
     * Differs from the configured port when that is 0.
     */
    public boundPort(): number | null {
        const address = this.httpServer?.address();
        return address && typeof address === 'object' ? address.port : null;
    }

    private async handleHttpRequest(req: http.IncomingMessage, res: http.ServerResponse): Promise<void> {
        const requestUrl = new URL(req.url || '', `http://${req.headers.host ?? 'localhost'}`);
        logger.debug(`HTTP interface received request: ${req.method} ${requestUrl.pathname}`);

        if (req.method === 'GET' && requestUrl.pathname === HEALTH_PATH) {
            res.writeHead(200, { 'Content-Type': 'application/json' }).end(JSON.stringify({ status: 'ok' }));
            return;
        }
        if (requestUrl.pathname !== this.settings.path) {
            res.writeHead(404).end('Not Found');
            return;
        }
        if (req.method !== 'POST') {
            writeJsonRpcError(res, 405, ErrorCode.ConnectionClosed, 'Method not allowed.');
            return;
        }

        const mcpServer = createMcpServer(this.service);
        const transport = new StreamableHTTPServerTransport({ sessionIdGenerator: undefined });
        res.on('close', () => {
            transport.close().catch((err: Error) => logger.warn(`Error closing HTTP transport: ${err.message}`));
            mcpServer.close().catch((err: Error) => logger.warn(`Error closing MCP server: ${err.message}`));
        });

        await mcpServer.connect(transport);
        await transport.handleRequest(req, res);
    }

    /**
     * Stops accepting connections and waits for the server to close.
     */
    public async stop(): Promise<void> {
        logger.info('Stopping streamable HTTP interface...');
        const httpServer = this.httpServer;
        if (!httpServer) {
            return;
        }
        return new Promise((resolve, reject) => {
            httpServer.close((err) => {
                if (err) {
                    logger.error(`Error closing HTTP server: ${err.message}`);
                    reject(err);
                } else {
                    logger.info('Streamable HTTP interface stopped.');
                    this.httpServer = null;
                    resolve();
                }
            });
        });
    }
}

function writeJsonRpcError(res: http.ServerResponse, status: number, code: number, message: string): void {
    res.writeHead(status, { 'Content-Type': 'application/json' }).end(JSON.stringify({
        jsonrpc: '2.0',
        error: { code, message },
        id: null,
    }));
}
