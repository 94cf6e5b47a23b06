/**
 * Matching patterns shared by every analysis. Patterns used with `test()`
 * carry no `g` flag, so they keep no state between calls.
 */

/** A comment line, optionally indented. */
export const COMMENT_LINE = /^\s*#/;

/** The `name() {` declaration idiom. */
export const FUNCTION_START = /\(\s*\)\s*\{/;

export const FUNCTION_END = /\}/;

/** A closing brace preceded by a quote, most likely inside a string. */
export const QUOTED_FUNCTION_END = /'.*\}|".*\}/;

/** Branching constructs counted towards CCN. `;;` ends a case arm. */
export const BRANCH_KEYWORD = /if|while|for|;;/;

/** A branching keyword that follows a quote on the same line. */
export const QUOTED_BRANCH_KEYWORD = /'.*if|".*if|'.*while|".*while|'.*for|".*for/;

export const LOGICAL_OPERATOR = /&&|\|\|/;

/** Stripped from a declaration line to leave the function name. */
export const FUNCTION_NAME_NOISE = /function|[(){} ]/g;

export const BARE_CODE = 'BARE_CODE';
