import { describe, it, expect } from 'vitest';
import { InvalidOptionError, NoInputError, ShccnError, SourceReadError, exitCodeFor } from './errors.js';

describe('SourceReadError', () => {
    it('keeps the cause and its errno code', () => {
        const cause = Object.assign(new Error('no such file'), { code: 'ENOENT' });
        const error = new SourceReadError('x.sh', cause);

        expect(error).toBeInstanceOf(ShccnError);
        expect(error.message).toBe('Cannot read x.sh: no such file');
        expect(error.cause).toBe(cause);
        expect(error.toJSON()).toEqual({
            error: 'Cannot read x.sh: no such file',
            code: 'SOURCE_READ_ERROR',
            context: { path: 'x.sh', errno: 'ENOENT' },
        });
    });

    it('accepts non-error causes', () => {
        expect(new SourceReadError('y.sh', 'denied').context).toEqual({ path: 'y.sh', errno: undefined });
    });
});

describe('NoInputError', () => {
    it('names the patterns that matched nothing', () => {
        expect(new NoInputError(['src', '*.sh']).message).toBe('No shell scripts found in: src, *.sh');
    });
});

describe('exitCodeFor', () => {
    it('uses 2 for invalid options and 1 otherwise', () => {
        expect(exitCodeFor(new InvalidOptionError('format', 'x', 'text or json'))).toBe(2);
        expect(exitCodeFor(new NoInputError(['.']))).toBe(1);
        expect(exitCodeFor(new Error('boom'))).toBe(1);
    });
});
