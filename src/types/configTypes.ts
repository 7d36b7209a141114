import { z } from 'zod';
import type { LogLevel } from './loggingTypes.js';

// --- Zod Schemas for Validation ---

export const LogLevelSchema = z.enum(['error', 'warn', 'info', 'debug']);

export const TransportKindSchema = z.enum(['streamable_http', 'sse']);

export const ServiceTransportSchema = z.enum(['http', 'stdio']);

/**
 * Environment variables read at startup. Keys that are absent or empty are
 * treated the same way, so defaults apply to both.
 */
export const EnvSchema = z.object({
    OPENAI_API_KEY: z.string({ required_error: 'OPENAI_API_KEY is not set' }),
    OPENAI_MODEL: z.string().min(1).default('gpt-4.1-mini'),
    OPENAI_BASE_URL: z.string().url().optional(),
    OPENAI_TEMPERATURE: z.coerce.number().min(0).max(2).default(0.1),

    EA_MCP_URL: z.string({ required_error: 'EA_MCP_URL must be set' }).url(),
    EA_MCP_AUTH_BEARER: z.string().optional(),
    EA_MCP_TRANSPORT: TransportKindSchema.default('streamable_http'),
    EA_MCP_SERVER_NAME: z.string().min(1).default('ea-platform'),

    MCP_SERVER_TRANSPORT: ServiceTransportSchema.default('http'),
    MCP_SERVER_HOST: z.string().min(1).default('0.0.0.0'),
    MCP_SERVER_PORT: z.coerce.number().int().positive().max(65535).default(8000),
    MCP_SERVER_PATH: z.string().startsWith('/').default('/mcp'),

    AGENT_TIMEOUT_MS: z.coerce.number().int().positive().default(120000),
    AGENT_RECURSION_LIMIT: z.coerce.number().int().min(1).default(25),

    LOG_LEVEL: LogLevelSchema.default('info'),
});

export type EnvVars = z.infer<typeof EnvSchema>;

export type TransportKind = z.infer<typeof TransportKindSchema>;

export type ServiceTransport = z.infer<typeof ServiceTransportSchema>;

// --- Runtime configuration handed to components ---

/**
 * How to reach the remote tool-invocation endpoint. Owned by the tool directory.
 */
export interface ConnectionConfig {
    readonly endpointUrl: string;
    readonly authToken?: string;
    readonly transportKind: TransportKind;
    /** Label the remote server is known by in logs. */
    readonly serverLabel: string;
}

/**
 * Language model settings. Owned by the query agent.
 */
export interface ModelConfig {
    readonly modelIdentifier: string;
    readonly apiKey: string;
    readonly temperature: number;
    /** Base URL of an OpenAI-compatible endpoint, when not using OpenAI itself. */
    readonly baseUrl?: string;
}

export interface ServiceSettings {
    readonly transport: ServiceTransport;
    readonly host: string;
    readonly port: number;
    readonly path: string;
}

export interface AgentSettings {
    readonly timeoutMs: number;
    readonly recursionLimit: number;
}

export interface AppConfig {
    readonly model: ModelConfig;
    readonly connection: ConnectionConfig;
    readonly service: ServiceSettings;
    readonly agent: AgentSettings;
    readonly logLevel: LogLevel;
}
