import { COMMENT_LINE, FUNCTION_START } from './patterns.js';

/** True when nothing but spaces is left on the line. Tabs count as content. */
export function isBlank(line: string): boolean {
    return line.replaceAll(' ', '').length === 0;
}

/**
 * Comment test. The first physical line is never a comment: a `#!`
 * shebang counts as code. Without an index the line is judged on its
 * text alone.
 */
export function isComment(line: string, lineIndex?: number): boolean {
    if (lineIndex === 0) return false;
    return COMMENT_LINE.test(line);
}

/**
 * Drop every single-quoted segment, quotes included. An unterminated
 * quote swallows the rest of the line.
 */
export function stripSingleQuoted(line: string): string {
    let result = '';
    let quoted = false;

    for (const ch of line) {
        if (ch === "'") {
            quoted = !quoted;
            continue;
        }
        if (!quoted) result += ch;
    }

    return result;
}

/** Whether the line opens a function, ignoring anything between quotes. */
export function isFunctionStart(line: string): boolean {
    let text = line.replaceAll('"', "'");
    if (text.includes("'")) {
        text = stripSingleQuoted(text);
    }
    return FUNCTION_START.test(text);
}
