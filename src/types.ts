/** A shell script as an ordered list of its physical lines. */
export interface SourceFile {
    readonly name: string;
    readonly lines: readonly string[];
}

export interface FileMetrics {
    lineCount: number;
    codeCount: number;
    commentCount: number;
    blankCount: number;
    functionCount: number;
}

export interface FunctionMetrics {
    name: string;
    codeLineCount: number;
    ccn: number;
}

export interface FileReport {
    path: string;
    name: string;
    metrics: FileMetrics;
    functions: FunctionMetrics[];
}

export interface ScanFailure {
    path: string;
    code: string;
    message: string;
}

export interface ProjectReport {
    root: string;
    timestamp: string;
    ccnThreshold: number;
    files: FileReport[];
    failures: ScanFailure[];
    totals: FileMetrics;
}

export type OutputFormat = 'text' | 'json';
