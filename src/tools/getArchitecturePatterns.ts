import { z } from 'zod';
import { defineServiceTool } from './serviceTool.js';

export const inputSchema = z.object({
    architecture_type: z.string().describe("Architecture type (e.g., 'microservices', 'event-driven', 'serverless')"),
});

export default defineServiceTool({
    name: 'get_architecture_patterns',
    description: 'Get architectural patterns and design guidelines for a specific architecture style.',
    inputSchema,
    handler: (args, service) => service.getArchitecturePatterns(args.architecture_type),
});
