import type { ModelConfig } from '../types/configTypes.js';
import type { AgentSession, QueryResult, ReasoningLoop } from '../types/agentTypes.js';
import type { RemoteTool } from '../types/toolTypes.js';
import { AgentError, InvalidArgumentError } from '../lib/errors.js';
import { ErrorHandler } from '../lib/ErrorHandler.js';
import { logger } from '../utils/logger.js';

export const SYSTEM_INSTRUCTION =
    'You retrieve and synthesize design standards from the enterprise architecture platform. ' +
    'Call the available tools as needed to look up standards, patterns, fact sheets and guidelines, ' +
    'observe each result before deciding the next step, and finish with one coherent final answer. ' +
    'Be concise and focus on the most relevant information. ' +
    'If no tools are available, answer from your own knowledge and say that the platform was not consulted.';

const DEFAULT_TIMEOUT_MS = 120000;
const DEFAULT_RECURSION_LIMIT = 25;

export interface QueryAgentOptions {
    /** How long one answer may take before the loop is aborted. */
    timeoutMs?: number;
    /** Maximum reasoning steps per answer. */
    recursionLimit?: number;
}

/**
 * Rejects blank topics and returns the topic without surrounding whitespace.
 * @throws InvalidArgumentError for empty or whitespace-only input.
 */
export function assertTopic(topic: string): string {
    const trimmed = topic.trim();
    if (trimmed.length === 0) {
        throw new InvalidArgumentError('Topic must not be blank.');
    }
    return trimmed;
}

/**
 * Builds reasoning sessions and drives them to a final answer.
 * The loop itself (tool choice, ordering, observation) belongs to the injected ReasoningLoop.
 */
export class QueryAgent {
    private readonly timeoutMs: number;
    private readonly recursionLimit: number;

    constructor(private readonly loop: ReasoningLoop, options: QueryAgentOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
        this.recursionLimit = options.recursionLimit ?? DEFAULT_RECURSION_LIMIT;
    }

    /**
     * Binds a snapshot of the given tools to the system instruction and model.
     * The session keeps its own copy, so it can be reused across questions
     * without picking up later changes to the caller's list.
     */
    public createSession(tools: readonly RemoteTool[], model: ModelConfig): AgentSession {
        return Object.freeze({
            tools: Object.freeze([...tools]),
            systemInstruction: SYSTEM_INSTRUCTION,
            model,
        });
    }

    /**
     * Answers one topic with a fresh session over the given tools.
     * An empty tool list is valid: the model answers on its own.
     */
    public async answer(topic: string, tools: readonly RemoteTool[], model: ModelConfig): Promise<QueryResult> {
        assertTopic(topic);
        return this.ask(this.createSession(tools, model), topic);
    }

    /**
     * Runs one question through an existing session.
     * @throws InvalidArgumentError for a blank topic, before the model is called.
     * @throws AgentError wrapping any failure of the loop, including timeouts.
     */
    public async ask(session: AgentSession, topic: string): Promise<QueryResult> {
        const userMessage = assertTopic(topic);
        logger.info(`Running agent with ${session.tools.length} tools (model: ${session.model.modelIdentifier})`);
        logger.debug(`Bound tools: ${session.tools.map(tool => tool.name).join(', ') || '(none)'}`);

        const controller = new AbortController();
        let timer: NodeJS.Timeout | undefined;
        const timeout = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                reject(new AgentError(`Reasoning loop did not finish within ${this.timeoutMs}ms.`));
                controller.abort();
            }, this.timeoutMs);
        });

        let finalText: string;
        try {
            finalText = await Promise.race([
                this.loop.run({
                    systemInstruction: session.systemInstruction,
                    userMessage,
                    tools: session.tools,
                    model: session.model,
                    recursionLimit: this.recursionLimit,
                    signal: controller.signal,
                }),
                timeout,
            ]);
        } catch (error: unknown) {
            if (error instanceof AgentError) {
                throw error;
            }
            logger.error(`Reasoning loop failed: ${ErrorHandler.describe(error)}`);
            const message = error instanceof Error ? error.message : String(error);
            throw new AgentError(`Reasoning loop failed: ${message}`, { cause: error });
        } finally {
            clearTimeout(timer);
        }

        if (finalText.trim().length === 0) {
            throw new AgentError('Reasoning loop finished without a final answer.');
        }
        return { finalText };
    }
}
