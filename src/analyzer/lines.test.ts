import { describe, it, expect } from 'vitest';
import { isBlank, isComment, isFunctionStart, stripSingleQuoted } from './lines.js';

describe('isBlank', () => {
    it('treats empty and space-only lines as blank', () => {
        expect(isBlank('')).toBe(true);
        expect(isBlank('   ')).toBe(true);
    });

    it('does not treat tabs as whitespace', () => {
        expect(isBlank('\t')).toBe(false);
        expect(isBlank('  \t  ')).toBe(false);
    });

    it('rejects lines with content', () => {
        expect(isBlank('  echo  ')).toBe(false);
    });
});

describe('isComment', () => {
    it('never counts the first line as a comment', () => {
        expect(isComment('# comment', 0)).toBe(false);
        expect(isComment('#!/bin/bash', 0)).toBe(false);
    });

    it('detects comments on later lines, indented or not', () => {
        expect(isComment('# comment', 1)).toBe(true);
        expect(isComment('    # indented', 5)).toBe(true);
        expect(isComment('\t# tabbed', 2)).toBe(true);
    });

    it('ignores trailing comments after code', () => {
        expect(isComment('echo hi # note', 3)).toBe(false);
    });

    it('judges the text alone when no index is given', () => {
        expect(isComment('#!/bin/bash')).toBe(true);
        expect(isComment('echo')).toBe(false);
    });
});

describe('stripSingleQuoted', () => {
    it('removes quoted segments together with their quotes', () => {
        expect(stripSingleQuoted("echo 'a{b}' done")).toBe('echo  done');
        expect(stripSingleQuoted("'x' and 'y'")).toBe(' and ');
    });

    it('drops the rest of the line after an unterminated quote', () => {
        expect(stripSingleQuoted("echo 'abc")).toBe('echo ');
        expect(stripSingleQuoted("it's")).toBe('it');
    });

    it('leaves unquoted lines untouched', () => {
        expect(stripSingleQuoted('echo "x"')).toBe('echo "x"');
    });
});

describe('isFunctionStart', () => {
    it('recognizes declaration forms', () => {
        expect(isFunctionStart('foo() {')).toBe(true);
        expect(isFunctionStart('function foo () {')).toBe(true);
        expect(isFunctionStart('  bar ( ) {')).toBe(true);
        expect(isFunctionStart('baz(){ echo; }')).toBe(true);
    });

    it('requires the opening brace on the same line', () => {
        expect(isFunctionStart('foo()')).toBe(false);
        expect(isFunctionStart('if (x) then')).toBe(false);
    });

    it('ignores declarations inside quotes', () => {
        expect(isFunctionStart("echo 'foo() {'")).toBe(false);
        expect(isFunctionStart('echo "bar() {"')).toBe(false);
    });

    it('still matches when a quoted brace follows the declaration', () => {
        expect(isFunctionStart('foo() { echo "}"; }')).toBe(true);
    });

    it('gives the same answer on repeated calls', () => {
        const line = 'deploy() {';
        expect(isFunctionStart(line)).toBe(isFunctionStart(line));
        expect(isComment('# x', 1)).toBe(isComment('# x', 1));
        expect(isBlank('  ')).toBe(isBlank('  '));
    });
});
