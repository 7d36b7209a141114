import { config as dotenvConfig } from 'dotenv';
import { AppConfig, EnvSchema, EnvVars } from '../types/configTypes.js';
import { ConfigurationError } from '../lib/errors.js';
import { logger } from '../utils/logger.js';

type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Loads and validates the agent's configuration from environment variables.
 *
 * The result is built once per manager and frozen; components receive the
 * value (or the part they own) through their constructors instead of reading
 * process.env themselves.
 */
export class ConfigurationManager {
    private config: AppConfig | null = null;

    constructor(private readonly env: Environment) { }

    /**
     * Creates a manager over process.env after loading a local .env file, if any.
     * Variables already set in the environment take precedence over the file.
     */
    public static fromProcessEnv(): ConfigurationManager {
        dotenvConfig();
        return new ConfigurationManager(process.env);
    }

    /**
     * Validates the environment and returns the configuration.
     * Subsequent calls return the same object.
     * @throws ConfigurationError listing every missing or invalid setting.
     */
    public load(): AppConfig {
        if (this.config) {
            return this.config;
        }

        const validationResult = EnvSchema.safeParse(this.collectSetValues());
        if (!validationResult.success) {
            const errorMessages = validationResult.error.errors.map(e => `${e.path.join('.')}: ${e.message}`);
            throw new ConfigurationError(`Invalid configuration:\n- ${errorMessages.join('\n- ')}`, { cause: validationResult.error });
        }

        this.config = this.buildConfig(validationResult.data);
        logger.debug(`Configuration loaded: model=${this.config.model.modelIdentifier}, remote=${this.config.connection.endpointUrl} (${this.config.connection.transportKind}), auth=${this.config.connection.authToken ? 'bearer' : 'none'}`);
        return this.config;
    }

    /**
     * Drops unset and blank variables so schema defaults apply to both.
     */
    private collectSetValues(): Record<string, string> {
        const values: Record<string, string> = {};
        for (const [key, value] of Object.entries(this.env)) {
            if (value !== undefined && value.trim() !== '') {
                values[key] = value.trim();
            }
        }
        return values;
    }

    private buildConfig(vars: EnvVars): AppConfig {
        return Object.freeze({
            model: Object.freeze({
                modelIdentifier: vars.OPENAI_MODEL,
                apiKey: vars.OPENAI_API_KEY,
                temperature: vars.OPENAI_TEMPERATURE,
                baseUrl: vars.OPENAI_BASE_URL,
            }),
            connection: Object.freeze({
                endpointUrl: vars.EA_MCP_URL,
                authToken: vars.EA_MCP_AUTH_BEARER,
                transportKind: vars.EA_MCP_TRANSPORT,
                serverLabel: vars.EA_MCP_SERVER_NAME,
            }),
            service: Object.freeze({
                transport: vars.MCP_SERVER_TRANSPORT,
                host: vars.MCP_SERVER_HOST,
                port: vars.MCP_SERVER_PORT,
                path: vars.MCP_SERVER_PATH,
            }),
            agent: Object.freeze({
                timeoutMs: vars.AGENT_TIMEOUT_MS,
                recursionLimit: vars.AGENT_RECURSION_LIMIT,
            }),
            logLevel: vars.LOG_LEVEL,
        });
    }
}
