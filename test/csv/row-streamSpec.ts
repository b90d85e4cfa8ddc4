import { arrayToRowStream, IterableRowStream, collectRows, isCommentRow, Row } from '../../src/csv/row-stream';

describe('RowStream', () => {
    describe('IterableRowStream', () => {
        it('should return rows sequentially', async () => {
            async function* generator() {
                yield ['a', 'b'];
                yield ['1', '2'];
            }

            const stream = new IterableRowStream(generator());

            expect(await stream.next()).toEqual(['a', 'b']);
            expect(await stream.next()).toEqual(['1', '2']);
            expect(await stream.next()).toBeNull();
            expect(await stream.next()).toBeNull();
        });

        it('should stop iteration after close()', async () => {
            async function* generator() {
                yield ['1'];
                yield ['2'];
            }

            const stream = new IterableRowStream(generator());

            expect(await stream.next()).toEqual(['1']);
            await stream.close();
            expect(await stream.next()).toBeNull();
        });

        it('should run the source cleanup when closed early', async () => {
            let cleanedUp = false;
            async function* generator() {
                try {
                    yield ['1'];
                    yield ['2'];
                } finally {
                    cleanedUp = true;
                }
            }

            const stream = new IterableRowStream(generator());
            await stream.next();
            await stream.close();

            expect(cleanedUp).toBe(true);
        });

        it('should handle close() being called multiple times', async () => {
            const stream = arrayToRowStream([['1']]);

            await stream.close();
            await stream.close();
            expect(await stream.next()).toBeNull();
        });

        it('should read rows from an array', async () => {
            const stream = new IterableRowStream([['a'], ['b']]);

            expect(await stream.next()).toEqual(['a']);
            expect(await stream.next()).toEqual(['b']);
            expect(await stream.next()).toBeNull();
        });

        it('should skip comment rows when asked', async () => {
            const rows: Row[] = [['# header note'], ['id'], ['#1'], ['2']];

            expect(await collectRows(new IterableRowStream(rows, { skipComments: true }))).toEqual([['id'], ['2']]);
            expect(await collectRows(new IterableRowStream(rows))).toEqual(rows);
        });
    });

    describe('collectRows', () => {
        it('should drain rows in order', async () => {
            const rows: Row[] = [['h1', 'h2'], ['a', 'b'], ['c', 'd']];

            expect(await collectRows(arrayToRowStream(rows))).toEqual(rows);
        });

        it('should handle an empty stream', async () => {
            expect(await collectRows(arrayToRowStream([]))).toEqual([]);
        });
    });

    describe('isCommentRow', () => {
        it('should recognize a leading hash in the first cell', () => {
            expect(isCommentRow(['# note', 'x'])).toBe(true);
            expect(isCommentRow(['#'])).toBe(true);
        });

        it('should ignore hashes elsewhere', () => {
            expect(isCommentRow(['a', '#b'])).toBe(false);
            expect(isCommentRow([' #a'])).toBe(false);
            expect(isCommentRow([])).toBe(false);
        });
    });
});
