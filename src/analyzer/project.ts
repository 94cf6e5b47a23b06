import { glob, hasMagic } from 'glob';
import path from 'node:path';
import fs from 'fs-extra';
import { analyzeSource, sumMetrics } from './metrics.js';
import { readSourceFile } from './source.js';
import { NoInputError, SourceReadError } from '../errors.js';
import { consoleLogger, type Logger } from '../logger.js';
import type { FileReport, ProjectReport, ScanFailure } from '../types.js';

/** Extensions picked up when a directory is scanned */
export const SHELL_EXTENSIONS = ['.sh', '.bash'];

const IGNORED = ['**/node_modules/**', '**/.git/**', '**/.shccn/**'];

export interface ScanOptions {
    cwd?: string;
    ccnThreshold: number;
    logger?: Logger;
}

/** Build the glob pattern from SHELL_EXTENSIONS */
function buildGlobPattern(extensions: string[]): string {
    const exts = extensions.map(e => e.replace('.', ''));
    return `**/*.{${exts.join(',')}}`;
}

async function isDirectory(target: string): Promise<boolean> {
    try {
        return (await fs.stat(target)).isDirectory();
    } catch {
        // Missing paths are reported when they are read
        return false;
    }
}

/**
 * Expand path arguments into script paths. Directories are searched
 * recursively for shell extensions, glob patterns are matched as given and
 * anything else is taken as a file path, whatever its extension.
 */
export async function resolveScriptPaths(inputs: readonly string[], cwd: string): Promise<string[]> {
    const found = new Set<string>();

    for (const input of inputs) {
        const absolute = path.resolve(cwd, input);

        if (await isDirectory(absolute)) {
            const matches = await glob(buildGlobPattern(SHELL_EXTENSIONS), {
                cwd: absolute,
                ignore: IGNORED,
                nodir: true,
                absolute: true,
            });
            matches.forEach(match => found.add(match));
        } else if (hasMagic(input)) {
            const matches = await glob(input, { cwd, ignore: IGNORED, nodir: true, absolute: true });
            matches.forEach(match => found.add(match));
        } else {
            found.add(absolute);
        }
    }

    return [...found].sort();
}

function toDisplayPath(cwd: string, filePath: string): string {
    return path.relative(cwd, filePath).replace(/\\/g, '/') || path.basename(filePath);
}

type FileOutcome = { report: FileReport } | { failure: ScanFailure };

async function analyzeFile(filePath: string, cwd: string, logger: Logger): Promise<FileOutcome> {
    const displayPath = toDisplayPath(cwd, filePath);
    try {
        const source = await readSourceFile(filePath);
        logger.debug(`${displayPath}: ${source.lines.length} lines`);
        return { report: analyzeSource(source, displayPath) };
    } catch (error) {
        if (!(error instanceof SourceReadError)) throw error;
        logger.warn(error.message);
        return { failure: { path: displayPath, code: error.code, message: error.message } };
    }
}

/**
 * Analyze every script the inputs resolve to. Files are read concurrently
 * and a file that cannot be read is recorded as a failure without
 * stopping the others. Results come back in path order.
 */
export const scanProject = async (inputs: readonly string[], options: ScanOptions): Promise<ProjectReport> => {
    const cwd = options.cwd ?? process.cwd();
    const logger = options.logger ?? consoleLogger;

    const scripts = await resolveScriptPaths(inputs, cwd);
    if (scripts.length === 0) {
        throw new NoInputError(inputs);
    }
    logger.debug(`Resolved ${scripts.length} script(s)`);

    const outcomes = await Promise.all(scripts.map(script => analyzeFile(script, cwd, logger)));

    const files: FileReport[] = [];
    const failures: ScanFailure[] = [];
    for (const outcome of outcomes) {
        if ('report' in outcome) {
            files.push(outcome.report);
        } else {
            failures.push(outcome.failure);
        }
    }

    return {
        root: cwd,
        timestamp: new Date().toISOString(),
        ccnThreshold: options.ccnThreshold,
        files,
        failures,
        totals: sumMetrics(files.map(f => f.metrics)),
    };
};
