import type { ModelConfig } from './configTypes.js';
import type { RemoteTool } from './toolTypes.js';

/**
 * The synthesized answer. Plain text only; callers parse it at their own risk.
 */
export interface QueryResult {
    finalText: string;
}

/**
 * The bound combination of tools, system instruction and model used to drive
 * one or more queries. The tool list is a snapshot taken when the session was created.
 */
export interface AgentSession {
    readonly tools: readonly RemoteTool[];
    readonly systemInstruction: string;
    readonly model: ModelConfig;
}

export interface ReasoningRequest {
    systemInstruction: string;
    userMessage: string;
    tools: readonly RemoteTool[];
    model: ModelConfig;
    /** Upper bound on reasoning steps before the loop gives up. */
    recursionLimit: number;
    /** Aborted when the caller stops waiting for an answer. */
    signal: AbortSignal;
}

/**
 * A reasoning-and-acting loop: alternates between choosing an action (call a
 * tool or finish) and observing its result, until it emits a final answer.
 */
export interface ReasoningLoop {
    run(request: ReasoningRequest): Promise<string>;
}
