import { z } from 'zod';
import { defineServiceTool } from './serviceTool.js';

export const inputSchema = z.object({
    topic: z.string().describe("The topic to search for (e.g., 'event driven architecture', 'microservices', 'API security')"),
});

/**
 * Searches the platform for design standards, best practices and guidelines on a topic.
 */
export default defineServiceTool({
    name: 'search_design_standards',
    description: 'Search for design standards, best practices, and architectural guidelines from the enterprise architecture platform.',
    inputSchema,
    handler: (args, service) => service.searchDesignStandards(args.topic),
});
