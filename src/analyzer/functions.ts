import { isFunctionStart } from './lines.js';
import { BARE_CODE, FUNCTION_END, FUNCTION_NAME_NOISE, QUOTED_FUNCTION_END } from './patterns.js';

/**
 * Derive a function name from its declaration line by removing the
 * `function` keyword, parentheses, braces and spaces. The result is not
 * validated.
 */
export function functionName(declaration: string): string {
    return declaration.replace(FUNCTION_NAME_NOISE, '');
}

function append(groups: Map<string, string[]>, name: string, line: string): void {
    const body = groups.get(name);
    if (body) {
        body.push(line);
    } else {
        groups.set(name, [line]);
    }
}

/**
 * Group code lines (comments and blanks already removed) into function
 * bodies. Lines outside any function land in BARE_CODE. Entries keep the
 * order in which their names were first seen; a name declared twice
 * collects both bodies.
 *
 * A closing brace ends the current function unless a quote precedes it
 * on the line. The closing line belongs to the body; the declaration
 * line does not.
 */
export function extractFunctions(codeLines: readonly string[]): Map<string, string[]> {
    const groups = new Map<string, string[]>();
    let current: string | undefined;

    for (const line of codeLines) {
        if (current !== undefined) {
            append(groups, current, line);
            if (FUNCTION_END.test(line) && !QUOTED_FUNCTION_END.test(line)) {
                current = undefined;
            }
            continue;
        }

        if (isFunctionStart(line)) {
            current = functionName(line);
            if (!groups.has(current)) groups.set(current, []);
            continue;
        }

        append(groups, BARE_CODE, line);
    }

    return groups;
}
