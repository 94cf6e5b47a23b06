import { computeCCN } from './complexity.js';
import { extractFunctions } from './functions.js';
import { isBlank, isComment, isFunctionStart } from './lines.js';
import type { FileMetrics, FileReport, FunctionMetrics, SourceFile } from '../types.js';

/** Lines left once comments and blanks are removed. A shebang goes too. */
export function codeLines(lines: readonly string[]): string[] {
    return lines.filter(line => !isComment(line) && !isBlank(line));
}

export function fileMetrics(source: SourceFile): FileMetrics {
    const lineCount = source.lines.length;
    let blankCount = 0;
    let commentCount = 0;
    let functionCount = 0;

    source.lines.forEach((line, index) => {
        if (isBlank(line)) blankCount++;
        if (isComment(line, index)) commentCount++;
        if (isFunctionStart(line)) functionCount++;
    });

    return {
        lineCount,
        codeCount: lineCount - blankCount - commentCount,
        commentCount,
        blankCount,
        functionCount,
    };
}

/** One row per function, plus BARE_CODE when there are top-level lines. */
export function functionMetrics(source: SourceFile): FunctionMetrics[] {
    const groups = extractFunctions(codeLines(source.lines));

    return Array.from(groups, ([name, body]) => ({
        name,
        codeLineCount: body.length,
        ccn: computeCCN(body),
    }));
}

export function analyzeSource(source: SourceFile, path: string = source.name): FileReport {
    return {
        path,
        name: source.name,
        metrics: fileMetrics(source),
        functions: functionMetrics(source),
    };
}

export function emptyMetrics(): FileMetrics {
    return { lineCount: 0, codeCount: 0, commentCount: 0, blankCount: 0, functionCount: 0 };
}

export function sumMetrics(metrics: readonly FileMetrics[]): FileMetrics {
    return metrics.reduce((total, m) => ({
        lineCount: total.lineCount + m.lineCount,
        codeCount: total.codeCount + m.codeCount,
        commentCount: total.commentCount + m.commentCount,
        blankCount: total.blankCount + m.blankCount,
        functionCount: total.functionCount + m.functionCount,
    }), emptyMetrics());
}
