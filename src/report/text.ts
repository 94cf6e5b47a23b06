import type { FileReport, FunctionMetrics } from '../types.js';

export const SEPARATOR = '-'.repeat(80);

type Colorize = (text: string) => string;

const plain: Colorize = text => text;

// Columns widen for longer values instead of truncating them.
const left = (value: string, width: number) => value.padEnd(width);
const right = (value: string | number, width: number) => String(value).padStart(width);

function summaryLine(cells: [string, ...(string | number)[]]): string {
    const [name, ...counts] = cells;
    return [left(name, 20), ...counts.map(c => right(c, 10))].join(' ');
}

export function summaryHeader(): string {
    return [
        SEPARATOR,
        summaryLine(['Name', 'Lines', 'Code', 'Comments', 'Blanks', 'Functions']),
        SEPARATOR,
    ].join('\n') + '\n';
}

export function summaryRow(file: FileReport): string {
    const m = file.metrics;
    return summaryLine([file.name, m.lineCount, m.codeCount, m.commentCount, m.blankCount, m.functionCount]) + '\n';
}

export function functionHeader(): string {
    return [
        SEPARATOR,
        `${left('Name', 30)} ${right('Code', 20)} ${right('CCN', 20)}`,
        SEPARATOR,
    ].join('\n') + '\n';
}

/** A function row, named `<function>@<file>`. */
export function functionRow(script: string, fn: FunctionMetrics): string {
    return `${left(`${fn.name}@${script}`, 30)} ${right(fn.codeLineCount, 20)} ${right(fn.ccn, 20)}\n`;
}

export function footer(): string {
    return `${SEPARATOR}\n`;
}

export interface TextReportOptions {
    ccnThreshold: number;
    /** Applied to function rows whose CCN is above the threshold. */
    highlight?: Colorize;
}

/**
 * Render the summary table followed by the function table, in the order
 * the files and functions were analyzed.
 */
export function renderTextReport(files: readonly FileReport[], options: TextReportOptions): string {
    const highlight = options.highlight ?? plain;

    let out = summaryHeader();
    for (const file of files) {
        out += summaryRow(file);
    }
    out += footer();

    out += functionHeader();
    for (const file of files) {
        for (const fn of file.functions) {
            const row = functionRow(file.name, fn);
            out += fn.ccn > options.ccnThreshold ? `${highlight(row.slice(0, -1))}\n` : row;
        }
    }
    out += footer();

    return out;
}
