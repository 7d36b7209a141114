import type { ModelConfig } from '../types/configTypes.js';
import type { QueryResult } from '../types/agentTypes.js';
import type { ToolDirectory } from '../types/toolTypes.js';
import { QueryAgent, assertTopic } from '../managers/QueryAgent.js';
import { DEFAULT_VOCABULARY, selectRelevant } from '../managers/ToolSelector.js';
import { logger } from '../utils/logger.js';

/**
 * The kinds of question the agent is asked, each phrased for the model by its template.
 */
export type QueryKind = 'fetch' | 'search' | 'architecture' | 'technology' | 'security';

export const QUERY_TEMPLATES: Readonly<Record<QueryKind, (subject: string) => string>> = {
    fetch: subject => `Fetch design standards for: ${subject}`,
    search: subject => `Search for design standards about: ${subject}`,
    architecture: subject => `Get architectural patterns and guidelines for: ${subject}`,
    technology: subject => `Get technology standards and guidelines for: ${subject}`,
    security: subject => `Get security guidelines and best practices for: ${subject}`,
};

export interface DesignStandardsServiceOptions {
    /** Overrides the tool selection vocabulary. */
    vocabulary?: readonly string[];
}

/**
 * Answers design-standards questions: lists the remote tools, keeps the
 * relevant ones, and hands them to the query agent.
 *
 * Every call is its own chain with a fresh listing; in-flight queries share
 * only the directory connection.
 */
export class DesignStandardsService {
    private readonly vocabulary: readonly string[];

    constructor(
        private readonly directory: ToolDirectory,
        private readonly agent: QueryAgent,
        private readonly model: ModelConfig,
        options: DesignStandardsServiceOptions = {},
    ) {
        this.vocabulary = options.vocabulary ?? DEFAULT_VOCABULARY;
    }

    /**
     * @throws InvalidArgumentError for a blank subject, before the directory is contacted.
     */
    public async query(kind: QueryKind, subject: string): Promise<QueryResult> {
        const trimmed = assertTopic(subject);
        logger.info(`Handling ${kind} query for: ${trimmed}`);

        const tools = await this.directory.listTools();
        const selected = selectRelevant(tools, this.vocabulary);
        logger.info(`Selected ${selected.length} of ${tools.length} tools`);

        const result = await this.agent.answer(QUERY_TEMPLATES[kind](trimmed), selected, this.model);
        logger.info(`${kind} query completed`);
        return result;
    }

    public fetchDesignStandards(topic: string): Promise<QueryResult> {
        return this.query('fetch', topic);
    }

    public searchDesignStandards(topic: string): Promise<QueryResult> {
        return this.query('search', topic);
    }

    public getArchitecturePatterns(architectureType: string): Promise<QueryResult> {
        return this.query('architecture', architectureType);
    }

    public getTechnologyStandards(technology: string): Promise<QueryResult> {
        return this.query('technology', technology);
    }

    public getSecurityGuidelines(securityArea: string): Promise<QueryResult> {
        return this.query('security', securityArea);
    }

    public async close(): Promise<void> {
        await this.directory.close();
    }
}
