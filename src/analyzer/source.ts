import path from 'node:path';
import fs from 'fs-extra';
import { SourceReadError } from '../errors.js';
import type { SourceFile } from '../types.js';

/**
 * Split file content into physical lines. A trailing newline does not
 * open an extra empty line, and a `\r` before the newline is dropped.
 */
export function splitLines(content: string): string[] {
    if (content.length === 0) return [];

    const lines = content.split('\n');
    if (lines[lines.length - 1] === '') lines.pop();

    return lines.map(line => (line.endsWith('\r') ? line.slice(0, -1) : line));
}

export function createSourceFile(name: string, lines: readonly string[]): SourceFile {
    return Object.freeze({ name, lines: Object.freeze([...lines]) });
}

/** Read a script from disk. The source is named after the file's base name. */
export async function readSourceFile(filePath: string): Promise<SourceFile> {
    let content: string;
    try {
        content = await fs.readFile(filePath, 'utf-8');
    } catch (error) {
        throw new SourceReadError(filePath, error);
    }
    return createSourceFile(path.basename(filePath), splitLines(content));
}
