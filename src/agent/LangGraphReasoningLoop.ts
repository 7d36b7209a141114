import { ChatOpenAI } from '@langchain/openai';
import { ToolNode, createReactAgent } from '@langchain/langgraph/prebuilt';
import { HumanMessage, SystemMessage } from '@langchain/core/messages';
import type { BaseMessage } from '@langchain/core/messages';
import { DynamicStructuredTool } from '@langchain/core/tools';
import type { RunnableConfig } from '@langchain/core/runnables';
import type { JSONSchema } from '@langchain/core/utils/json_schema';
import type { ModelConfig } from '../types/configTypes.js';
import type { ReasoningLoop, ReasoningRequest } from '../types/agentTypes.js';
import type { RemoteTool } from '../types/toolTypes.js';
import { logger } from '../utils/logger.js';

/**
 * Wraps a remote tool for LangChain. The tool keeps the JSON schema the
 * remote endpoint advertised, so the model sees the parameters as advertised.
 */
export function toLangChainTool(tool: RemoteTool) {
    return new DynamicStructuredTool({
        name: tool.name,
        description: tool.description || tool.name,
        // Raw JSON schema from the remote listing; LangChain validates it on invoke.
        schema: tool.parameterSchema as JSONSchema,
        func: async (input: unknown, _runManager: unknown, config?: RunnableConfig) => {
            logger.debug(`Agent invoking tool ${tool.name}`);
            return tool.invoke(isRecord(input) ? input : {}, { signal: config?.signal });
        },
    });
}

/**
 * ReAct loop backed by LangGraph's prebuilt agent and an OpenAI chat model.
 */
export class LangGraphReasoningLoop implements ReasoningLoop {
    public async run(request: ReasoningRequest): Promise<string> {
        const llm = createChatModel(request.model);
        const messages = [new HumanMessage(request.userMessage)];

        if (request.tools.length === 0) {
            // Nothing to call, so there is no loop to run.
            const reply = await llm.invoke([new SystemMessage(request.systemInstruction), ...messages], { signal: request.signal });
            return messageText(reply);
        }

        const agent = createReactAgent({
            llm,
            // Tool failures end the run instead of being fed back to the model as text.
            tools: new ToolNode(request.tools.map(toLangChainTool), { handleToolErrors: false }),
            prompt: request.systemInstruction,
        });
        const state = await agent.invoke(
            { messages },
            { recursionLimit: request.recursionLimit, signal: request.signal },
        );
        const finalMessage = state.messages[state.messages.length - 1];
        return finalMessage ? messageText(finalMessage) : '';
    }
}

function createChatModel(model: ModelConfig): ChatOpenAI {
    return new ChatOpenAI({
        model: model.modelIdentifier,
        apiKey: model.apiKey,
        temperature: model.temperature,
        configuration: model.baseUrl ? { baseURL: model.baseUrl } : undefined,
    });
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function messageText(message: BaseMessage): string {
    if (typeof message.content === 'string') {
        return message.content;
    }
    return message.content
        .map(part => ('text' in part && typeof part.text === 'string') ? part.text : '')
        .join('');
}
