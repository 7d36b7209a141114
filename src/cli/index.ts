#!/usr/bin/env node
import * as readline from 'readline/promises';
import { Command } from 'commander';
import { ConfigurationManager } from '../config/ConfigurationManager.js';
import { McpToolDirectory } from '../managers/ToolDirectory.js';
import { QueryAgent } from '../managers/QueryAgent.js';
import { LangGraphReasoningLoop } from '../agent/LangGraphReasoningLoop.js';
import { DesignStandardsService } from '../services/DesignStandardsService.js';
import { ErrorHandler } from '../lib/ErrorHandler.js';
import { logger } from '../utils/logger.js';
import { resolveTopic, runSingleShot } from './singleShot.js';

async function promptForTopic(): Promise<string> {
    const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
    try {
        return await rl.question('Enter topic: ');
    } finally {
        rl.close();
    }
}

async function run(words: string[], options: { verbose?: boolean }): Promise<number> {
    let service: DesignStandardsService | null = null;
    try {
        const config = ConfigurationManager.fromProcessEnv().load();
        logger.setLevel(options.verbose ? 'debug' : config.logLevel);

        const topic = await resolveTopic(words, promptForTopic);
        service = new DesignStandardsService(
            new McpToolDirectory(config.connection),
            new QueryAgent(new LangGraphReasoningLoop(), {
                timeoutMs: config.agent.timeoutMs,
                recursionLimit: config.agent.recursionLimit,
            }),
            config.model,
        );
        return await runSingleShot(service, topic, process.stdout);
    } catch (error: unknown) {
        logger.error(ErrorHandler.describe(error));
        return ErrorHandler.exitCodeFor(error);
    } finally {
        await service?.close();
    }
}

const program = new Command()
    .name('design-standards')
    .description('Ask the enterprise architecture platform for design standards on a topic')
    .argument('[topic...]', 'topic to look up; prompts for one when omitted')
    .option('-v, --verbose', 'log debug output to stderr')
    .action(async (words: string[], options: { verbose?: boolean }) => {
        process.exitCode = await run(words, options);
    });

program.parseAsync(process.argv).catch((error: unknown) => {
    logger.error(ErrorHandler.describe(error));
    process.exitCode = 1;
});
