import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { ErrorCode, McpError } from '@modelcontextprotocol/sdk/types.js';
import { ErrorHandler, EXIT_CONFIGURATION, EXIT_FAILURE, EXIT_USAGE } from '../../src/lib/ErrorHandler';
import {
    AgentError,
    ConfigurationError,
    ConnectionError,
    InvalidArgumentError,
    ProtocolError,
    ToolInvocationError,
} from '../../src/lib/errors';

describe('ErrorHandler', () => {
    describe('describe', () => {
        it('renders the cause chain on one line', () => {
            const error = new AgentError('Reasoning loop failed', { cause: new Error('rate limited') });
            expect(ErrorHandler.describe(error)).toBe('AgentError: Reasoning loop failed (caused by: Error: rate limited)');
        });

        it('renders non-errors as strings', () => {
            expect(ErrorHandler.describe('boom')).toBe('boom');
        });
    });

    describe('toMcpError', () => {
        it('passes McpError through', () => {
            const original = new McpError(ErrorCode.MethodNotFound, 'nope');
            expect(ErrorHandler.toMcpError(original)).toBe(original);
        });

        it('maps invalid arguments to InvalidParams with context', () => {
            const error = ErrorHandler.toMcpError(new InvalidArgumentError('Topic must not be blank.'), 'search_design_standards');
            expect(error.code).toBe(ErrorCode.InvalidParams);
            expect(error.message).toBe('MCP error -32602: [search_design_standards] Topic must not be blank.');
        });

        it('maps other errors to InternalError', () => {
            const error = ErrorHandler.toMcpError(new ConnectionError('down'));
            expect(error.code).toBe(ErrorCode.InternalError);
            expect(error.data).toEqual({ errorName: 'ConnectionError' });
        });
    });

    it('builds a failed tool result', () => {
        expect(ErrorHandler.toToolErrorResult(new ToolInvocationError('search', 'bad query'))).toEqual({
            content: [{ type: 'text', text: 'Error querying the architecture platform: bad query' }],
            isError: true,
        });
    });

    it.each<[string, unknown, number]>([
        ['configuration', new ConfigurationError('missing'), EXIT_CONFIGURATION],
        ['invalid argument', new InvalidArgumentError('blank'), EXIT_USAGE],
        ['connection', new ConnectionError('down'), EXIT_FAILURE],
        ['protocol', new ProtocolError('garbled'), EXIT_FAILURE],
        ['agent', new AgentError('timeout'), EXIT_FAILURE],
        ['plain error', new Error('other'), EXIT_FAILURE],
    ])('maps a %s failure to its exit code', (_kind, error, code) => {
        expect(ErrorHandler.exitCodeFor(error)).toBe(code);
    });
});
