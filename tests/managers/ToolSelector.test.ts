import { DEFAULT_VOCABULARY, selectRelevant } from '../../src/managers/ToolSelector';
import type { ToolDescriptor } from '../../src/types/toolTypes';

function descriptor(name: string, description = ''): ToolDescriptor {
    return { name, description, parameterSchema: { type: 'object' } };
}

describe('selectRelevant', () => {
    const catalog = [
        descriptor('search_fact_sheets', 'Looks up inventory items by name'),
        descriptor('create_fact_sheet', 'Creates an inventory item'),
        descriptor('list_roles', 'Lists the roles of a workspace'),
    ];

    it('keeps only tools whose name matches a vocabulary term', () => {
        const selected = selectRelevant(catalog, ['search', 'get', 'find', 'overview', 'fact sheet']);
        expect(selected.map(t => t.name)).toEqual(['search_fact_sheets']);
    });

    it('matches terms found only in the description', () => {
        const tools = [descriptor('lookup', 'Retrieve the architecture overview'), descriptor('delete_item', 'Removes an item')];
        expect(selectRelevant(tools, ['overview']).map(t => t.name)).toEqual(['lookup']);
    });

    it('preserves input order', () => {
        const tools = [descriptor('get_b'), descriptor('unrelated'), descriptor('find_a'), descriptor('search_c')];
        expect(selectRelevant(tools, ['search', 'find', 'get']).map(t => t.name)).toEqual(['get_b', 'find_a', 'search_c']);
    });

    it('compares case-insensitively', () => {
        const tools = [descriptor('SearchFactSheets'), descriptor('x', 'Shows a FACT SHEET')];
        expect(selectRelevant(tools, ['search', 'Fact Sheet']).map(t => t.name)).toEqual(['SearchFactSheets', 'x']);
    });

    it('returns an empty list when nothing matches', () => {
        expect(selectRelevant(catalog, ['deploy'])).toEqual([]);
        expect(selectRelevant([], DEFAULT_VOCABULARY)).toEqual([]);
    });

    it('keeps the first of repeated names', () => {
        const first = descriptor('search', 'first');
        const tools = [first, descriptor('search', 'second')];
        const selected = selectRelevant(tools, ['search']);
        expect(selected).toHaveLength(1);
        expect(selected[0]).toBe(first);
    });

    it('returns the same selection for the same input', () => {
        expect(selectRelevant(catalog)).toEqual(selectRelevant(catalog));
    });

    it('uses the default vocabulary when none is given', () => {
        const tools = [descriptor('get_application'), descriptor('create_application'), descriptor('fetch', 'Returns a record')];
        expect(selectRelevant(tools).map(t => t.name)).toEqual(['get_application', 'fetch']);
    });

    it('ignores empty terms', () => {
        expect(selectRelevant(catalog, [''])).toEqual([]);
    });
});
