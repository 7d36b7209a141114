import { z } from 'zod';
import { defineServiceTool } from './serviceTool.js';

export const inputSchema = z.object({
    technology: z.string().describe("Technology name (e.g., 'Kafka', 'React', 'Kubernetes')"),
});

export default defineServiceTool({
    name: 'get_technology_standards',
    description: 'Get technology standards and guidelines for specific technologies or frameworks.',
    inputSchema,
    handler: (args, service) => service.getTechnologyStandards(args.technology),
});
