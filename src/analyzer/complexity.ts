import { BRANCH_KEYWORD, LOGICAL_OPERATOR, QUOTED_BRANCH_KEYWORD } from './patterns.js';

/**
 * Heuristic cyclomatic complexity of a function body.
 *
 * Starts at 1. A line mentioning `if`, `while`, `for` or `;;` adds one,
 * unless the keyword follows a quote on that line. Each space-separated
 * token containing `&&` or `||` adds one more.
 */
export function computeCCN(bodyLines: readonly string[]): number {
    let ccn = 1;

    for (const line of bodyLines) {
        if (BRANCH_KEYWORD.test(line) && !QUOTED_BRANCH_KEYWORD.test(line)) {
            ccn++;
        }

        for (const token of line.split(' ')) {
            if (LOGICAL_OPERATOR.test(token)) ccn++;
        }
    }

    return ccn;
}
