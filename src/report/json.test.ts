import { describe, it, expect } from 'vitest';
import { renderJsonReport } from './json.js';
import type { ProjectReport } from '../types.js';

describe('renderJsonReport', () => {
    it('serializes the whole report', () => {
        const report: ProjectReport = {
            root: '/work',
            timestamp: '2024-01-01T00:00:00.000Z',
            ccnThreshold: 10,
            files: [],
            failures: [{ path: 'x.sh', code: 'SOURCE_READ_ERROR', message: 'Cannot read x.sh: gone' }],
            totals: { lineCount: 0, codeCount: 0, commentCount: 0, blankCount: 0, functionCount: 0 },
        };

        const json = renderJsonReport(report);
        expect(JSON.parse(json)).toEqual(report);
        expect(json.split('\n')[1]).toBe('  "root": "/work",');
    });
});
