import { jest } from '@jest/globals';

jest.mock('../../src/utils/logger', () => ({
    logger: {
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        debug: jest.fn(),
    },
}));

import { DesignStandardsService } from '../../src/services/DesignStandardsService';
import { QueryAgent } from '../../src/managers/QueryAgent';
import { ConnectionError, InvalidArgumentError } from '../../src/lib/errors';
import type { QueryResult } from '../../src/types/agentTypes';
import { StubDirectory, TEST_MODEL, stubLoop, stubTool } from '../helpers/stubs';

const catalog = [
    stubTool('search_fact_sheets', 'Looks up inventory items by name'),
    stubTool('create_fact_sheet', 'Creates an inventory item'),
    stubTool('list_roles', 'Lists the roles of a workspace'),
];

function createService(directory: StubDirectory, vocabulary?: readonly string[]) {
    const { loop, run } = stubLoop();
    const service = new DesignStandardsService(directory, new QueryAgent(loop), TEST_MODEL, { vocabulary });
    return { service, run };
}

describe('DesignStandardsService', () => {
    it('hands only the relevant tools to the agent', async () => {
        const directory = new StubDirectory(catalog);
        const { service, run } = createService(directory, ['search', 'get', 'find', 'overview', 'fact sheet']);

        const result = await service.searchDesignStandards('event driven architecture');

        expect(directory.listCalls).toBe(1);
        expect(run).toHaveBeenCalledTimes(1);
        expect(run.mock.calls[0][0].tools.map(t => t.name)).toEqual(['search_fact_sheets']);
        expect(result.finalText).toBe(
            'answer to "Search for design standards about: event driven architecture" using [search_fact_sheets]',
        );
    });

    it('answers without tools when none are relevant', async () => {
        const directory = new StubDirectory([catalog[1], catalog[2]]);
        const { service, run } = createService(directory);

        const result = await service.fetchDesignStandards('microservices');

        expect(run.mock.calls[0][0].tools).toEqual([]);
        expect(result.finalText).toBe('answer to "Fetch design standards for: microservices" using []');
    });

    it('propagates a connection failure without calling the agent', async () => {
        const failure = new ConnectionError('Could not connect to ea-test');
        const { service, run } = createService(new StubDirectory(failure));

        await expect(service.getSecurityGuidelines('authentication')).rejects.toBe(failure);
        expect(run).not.toHaveBeenCalled();
    });

    it('rejects a blank subject before listing tools', async () => {
        const directory = new StubDirectory(catalog);
        const { service, run } = createService(directory);

        await expect(service.getArchitecturePatterns('   ')).rejects.toThrow(InvalidArgumentError);
        expect(directory.listCalls).toBe(0);
        expect(run).not.toHaveBeenCalled();
    });

    it.each<[string, (service: DesignStandardsService) => Promise<QueryResult>, string]>([
        ['fetchDesignStandards', s => s.fetchDesignStandards('  Kafka '), 'Fetch design standards for: Kafka'],
        ['searchDesignStandards', s => s.searchDesignStandards('  Kafka '), 'Search for design standards about: Kafka'],
        ['getArchitecturePatterns', s => s.getArchitecturePatterns('  Kafka '), 'Get architectural patterns and guidelines for: Kafka'],
        ['getTechnologyStandards', s => s.getTechnologyStandards('  Kafka '), 'Get technology standards and guidelines for: Kafka'],
        ['getSecurityGuidelines', s => s.getSecurityGuidelines('  Kafka '), 'Get security guidelines and best practices for: Kafka'],
    ])('%s phrases the trimmed subject with its template', async (_name, call, expected) => {
        const { service, run } = createService(new StubDirectory(catalog));

        await call(service);

        expect(run.mock.calls[0][0].userMessage).toBe(expected);
    });

    it('lists tools afresh for every query', async () => {
        const directory = new StubDirectory(catalog);
        const { service } = createService(directory);

        await service.searchDesignStandards('a');
        await service.searchDesignStandards('b');

        expect(directory.listCalls).toBe(2);
    });

    it('uses the default vocabulary unless overridden', async () => {
        const tools = [stubTool('get_application'), stubTool('list_roles')];
        const defaults = createService(new StubDirectory(tools));
        const custom = createService(new StubDirectory(tools), ['roles']);

        await defaults.service.searchDesignStandards('x');
        await custom.service.searchDesignStandards('x');

        expect(defaults.run.mock.calls[0][0].tools.map(t => t.name)).toEqual(['get_application']);
        expect(custom.run.mock.calls[0][0].tools.map(t => t.name)).toEqual(['list_roles']);
    });

    it('closes the directory', async () => {
        const directory = new StubDirectory(catalog);
        const { service } = createService(directory);

        await service.close();

        expect(directory.closed).toBe(true);
    });
});
