import { headerIndices, missingColumns, setDifference, unmatchedColumns } from '../../src/projector/columns';

describe('Column resolution', () => {
    const header = ['id', 'name', 'price', 'qty'];

    describe('setDifference', () => {
        it('should preserve the order of the universe', () => {
            expect(setDifference(header, ['qty', 'id'])).toEqual(['name', 'price']);
        });

        it('should return everything when nothing is subtracted', () => {
            expect(setDifference(header, [])).toEqual(header);
        });
    });

    describe('missingColumns', () => {
        it('should list requested names absent from the header in request order', () => {
            expect(missingColumns(['total', 'id', 'cost'], header)).toEqual(['total', 'cost']);
        });

        it('should be empty when every name is present', () => {
            expect(missingColumns(['price', 'id'], header)).toEqual([]);
        });
    });

    describe('headerIndices', () => {
        it('should find columns requested in header order', () => {
            expect(headerIndices(header, ['id', 'price'])).toEqual([0, 2]);
        });

        it('should stop matching at the first column requested out of order', () => {
            expect(headerIndices(header, ['price', 'id', 'qty'])).toEqual([2]);
        });

        it('should resolve the whole header', () => {
            expect(headerIndices(header, header)).toEqual([0, 1, 2, 3]);
        });

        it('should match repeated header names in order', () => {
            expect(headerIndices(['x', 'y', 'x'], ['x', 'x'])).toEqual([0, 2]);
        });
    });

    describe('unmatchedColumns', () => {
        it('should report the names after the last match', () => {
            const columns = ['price', 'id', 'qty'];

            expect(unmatchedColumns(columns, headerIndices(header, columns))).toEqual(['id', 'qty']);
        });
    });
});
