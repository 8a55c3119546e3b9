import { FilterDefinitionError, isFilterDefinitionError } from '@/lib/errors';
import { RangeFilter, SelectFilter } from '@/lib/search/filters';

describe('FilterDefinitionError', () => {
    it('lists every issue with its path', () => {
        const error = new FilterDefinitionError('price', [
            { code: 'custom', path: ['min'], message: 'min must not exceed max' },
            { code: 'custom', path: [], message: 'bad shape' },
        ]);

        expect(error.name).toBe('FilterDefinitionError');
        expect(error.filterName).toBe('price');
        expect(error.issues).toHaveLength(2);
        expect(error.message).toBe(
            'Invalid filter definition "price": min: min must not exceed max; (root): bad shape'
        );
    });

    it('names unnamed filters', () => {
        const error = new FilterDefinitionError('', [{ code: 'custom', path: ['name'], message: 'Required' }]);
        expect(error.message).toBe('Invalid filter definition "(unnamed)": name: Required');
    });

    it('is raised by filter constructors for invalid config', () => {
        expect(() => new RangeFilter({ name: 'price', min: 10, max: 1 })).toThrow(
            'Invalid filter definition "price": min: min must not exceed max'
        );
        expect(() => new SelectFilter({ name: 'city', priority: 1.5 })).toThrow(FilterDefinitionError);
    });

    it('is recognised by the type guard', () => {
        expect(isFilterDefinitionError(new FilterDefinitionError('x', []))).toBe(true);
        expect(isFilterDefinitionError(new Error('x'))).toBe(false);
    });
});
