import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'fs-extra';
import os from 'node:os';
import path from 'node:path';
import { resolveScriptPaths, scanProject } from './project.js';
import { NoInputError } from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';

describe('project scanning', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'shccn-project-'));
        await fs.outputFile(path.join(dir, 'a.sh'), '#!/bin/bash\nfoo() {\n  if true; then :; fi\n}\n');
        await fs.outputFile(path.join(dir, 'lib', 'b.bash'), 'echo b\n');
        await fs.outputFile(path.join(dir, 'notes.txt'), 'x\n');
        await fs.outputFile(path.join(dir, 'node_modules', 'pkg', 'skip.sh'), 'echo skip\n');
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    describe('resolveScriptPaths', () => {
        it('finds shell scripts under a directory', async () => {
            expect(await resolveScriptPaths(['.'], dir)).toEqual([
                path.join(dir, 'a.sh'),
                path.join(dir, 'lib', 'b.bash'),
            ]);
        });

        it('takes explicit files whatever their extension', async () => {
            expect(await resolveScriptPaths(['notes.txt'], dir)).toEqual([path.join(dir, 'notes.txt')]);
        });

        it('expands glob patterns', async () => {
            expect(await resolveScriptPaths(['lib/*.bash'], dir)).toEqual([path.join(dir, 'lib', 'b.bash')]);
        });

        it('lists a file only once', async () => {
            expect(await resolveScriptPaths(['a.sh', '.'], dir)).toHaveLength(2);
        });
    });

    describe('scanProject', () => {
        it('analyzes every script and totals the metrics', async () => {
            const report = await scanProject(['.'], { cwd: dir, ccnThreshold: 10, logger: silentLogger });

            expect(report.ccnThreshold).toBe(10);
            expect(report.failures).toEqual([]);
            expect(report.files.map(f => f.path)).toEqual(['a.sh', 'lib/b.bash']);
            expect(report.files[0]).toEqual({
                path: 'a.sh',
                name: 'a.sh',
                metrics: { lineCount: 4, codeCount: 4, commentCount: 0, blankCount: 0, functionCount: 1 },
                functions: [{ name: 'foo', codeLineCount: 2, ccn: 2 }],
            });
            expect(report.files[1].functions).toEqual([{ name: 'BARE_CODE', codeLineCount: 1, ccn: 1 }]);
            expect(report.totals).toEqual({
                lineCount: 5,
                codeCount: 5,
                commentCount: 0,
                blankCount: 0,
                functionCount: 1,
            });
        });

        it('records unreadable files and keeps going', async () => {
            const logger: Logger = { ...silentLogger, warn: vi.fn() };
            const report = await scanProject(['a.sh', 'missing.sh'], { cwd: dir, ccnThreshold: 10, logger });

            expect(report.files.map(f => f.path)).toEqual(['a.sh']);
            expect(report.failures).toHaveLength(1);
            expect(report.failures[0]).toMatchObject({ path: 'missing.sh', code: 'SOURCE_READ_ERROR' });
            expect(logger.warn).toHaveBeenCalledTimes(1);
        });

        it('fails when nothing matches', async () => {
            await expect(
                scanProject(['nothing/*.sh'], { cwd: dir, ccnThreshold: 10, logger: silentLogger }),
            ).rejects.toBeInstanceOf(NoInputError);
        });
    });
});
