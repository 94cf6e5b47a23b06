import type { ProjectReport } from '../types.js';

export function renderJsonReport(report: ProjectReport): string {
    return JSON.stringify(report, null, 2);
}
