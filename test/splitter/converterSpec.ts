import { ExternalToolError } from '../../src/errors';
import { Csv2LatexConverter, csv2latexArguments, separatorCode } from '../../src/splitter/converter';

describe('Converter', () => {
    describe('separatorCode', () => {
        it('should map every supported delimiter', () => {
            expect(separatorCode(',')).toBe('c');
            expect(separatorCode(';')).toBe('s');
            expect(separatorCode('\t')).toBe('t');
            expect(separatorCode(' ')).toBe('p');
            expect(separatorCode(':')).toBe('l');
        });

        it('should reject other delimiters', () => {
            expect(() => separatorCode('|')).toThrow(ExternalToolError);
        });
    });

    describe('csv2latexArguments', () => {
        it('should pass the fixed rendering options before the file', () => {
            expect(csv2latexArguments('s', 'wide0.csv')).toEqual(
                ['-s', 's', '-n', '-r', '2', '-p', 'r', '-e', '-c', '0.75', 'wide0.csv']);
        });
    });

    describe('Csv2LatexConverter', () => {
        it('should refuse an unsupported delimiter when created', () => {
            expect(() => new Csv2LatexConverter('|')).toThrow(ExternalToolError);
        });

        it('should be named after the tool', () => {
            expect(new Csv2LatexConverter(',').name).toBe('csv2latex');
        });

        it('should fail without an exit code when the command cannot be started', async () => {
            const converter = new Csv2LatexConverter(',', 'csv2latex-not-installed-here');

            const conversion = converter.convert('wide0.csv');

            await expect(conversion).rejects.toBeInstanceOf(ExternalToolError);
            await expect(conversion).rejects.toMatchObject({ tool: 'csv2latex', exitCode: null });
        });

        it('should fail with the exit code of the command', async () => {
            const converter = new Csv2LatexConverter(';', 'false');

            const conversion = converter.convert('wide0.csv');

            await expect(conversion).rejects.toBeInstanceOf(ExternalToolError);
            await expect(conversion).rejects.toMatchObject({ tool: 'csv2latex', exitCode: 1 });
        });
    });
});
