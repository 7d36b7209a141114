import { z } from 'zod';
import { defineServiceTool } from './serviceTool.js';

export const inputSchema = z.object({
    security_area: z.string().describe("Security area (e.g., 'API security', 'authentication', 'data encryption')"),
});

export default defineServiceTool({
    name: 'get_security_guidelines',
    description: 'Get security guidelines, best practices, and standards from the enterprise architecture platform.',
    inputSchema,
    handler: (args, service) => service.getSecurityGuidelines(args.security_area),
});
