import type { QueryResult } from '../types/agentTypes.js';
import { assertTopic } from '../managers/QueryAgent.js';
import { ErrorHandler } from '../lib/ErrorHandler.js';
import { logger } from '../utils/logger.js';

export interface TopicQuery {
    fetchDesignStandards(topic: string): Promise<QueryResult>;
}

export interface OutputStream {
    write(chunk: string): unknown;
}

/**
 * Joins command-line words into one topic, or asks for one when none were given.
 */
export async function resolveTopic(words: readonly string[], prompt: () => Promise<string>): Promise<string> {
    if (words.length > 0) {
        return words.join(' ');
    }
    return prompt();
}

/**
 * Prints the topic, then its answer once the query completes. Returns the
 * process exit code; failures are logged and never printed as an answer.
 * A blank topic is rejected before anything is printed.
 */
export async function runSingleShot(service: TopicQuery, topic: string, output: OutputStream): Promise<number> {
    try {
        output.write(`Topic: ${assertTopic(topic)}\n\n`);
        const result = await service.fetchDesignStandards(topic);
        output.write(`${result.finalText}\n`);
        return 0;
    } catch (error: unknown) {
        logger.error(`Query failed: ${ErrorHandler.describe(error)}`);
        return ErrorHandler.exitCodeFor(error);
    }
}
