import type { FunctionMetrics, ProjectReport } from '../types.js';

interface FunctionEntry extends FunctionMetrics {
    file: string;
}

export function escapeHtml(text: string): string {
    return text
        .replace(/&/g, '&amp;')
        .replace(/</g, '&lt;')
        .replace(/>/g, '&gt;')
        .replace(/"/g, '&quot;')
        .replace(/'/g, '&#39;');
}

/** Every function across the report, most complex first. */
export function rankFunctions(report: ProjectReport): FunctionEntry[] {
    return report.files
        .flatMap(file => file.functions.map(fn => ({ ...fn, file: file.path })))
        .sort((a, b) => b.ccn - a.ccn);
}

function card(title: string, value: string | number, accent = false): string {
    const style = accent ? ' style="color: var(--accent-color)"' : '';
    return `
            <div class="card">
                <h3>${escapeHtml(title)}</h3>
                <div class="value"${style}>${escapeHtml(String(value))}</div>
            </div>`;
}

function fileRows(report: ProjectReport): string {
    return report.files.map(f => `
                    <tr>
                        <td>${escapeHtml(f.path)}</td>
                        <td>${f.metrics.lineCount}</td>
                        <td>${f.metrics.codeCount}</td>
                        <td>${f.metrics.commentCount}</td>
                        <td>${f.metrics.blankCount}</td>
                        <td>${f.metrics.functionCount}</td>
                    </tr>`).join('');
}

function functionRows(functions: FunctionEntry[], threshold: number): string {
    if (functions.length === 0) {
        return '<tr><td colspan="3" class="muted">No code found</td></tr>';
    }
    return functions.map(fn => `
                    <tr${fn.ccn > threshold ? ' class="over"' : ''}>
                        <td>${escapeHtml(`${fn.name}@${fn.file}`)}</td>
                        <td>${fn.codeLineCount}</td>
                        <td><span class="badge">${fn.ccn}</span></td>
                    </tr>`).join('');
}

function failureList(report: ProjectReport): string {
    if (report.failures.length === 0) return '';
    return `
        <div class="card wide">
            <h3>Unreadable Files</h3>
            <ul class="failures">
                ${report.failures.map(f => `<li>${escapeHtml(f.message)}</li>`).join('')}
            </ul>
        </div>`;
}

export const generateDashboard = (report: ProjectReport): string => {
    const functions = rankFunctions(report);
    const maxCcn = functions.reduce((max, fn) => Math.max(max, fn.ccn), 0);
    const overThreshold = functions.filter(fn => fn.ccn > report.ccnThreshold).length;

    return `<!DOCTYPE html>
<html lang="en">
<head>
    <meta charset="UTF-8">
    <meta name="viewport" content="width=device-width, initial-scale=1.0">
    <title>shccn - ${escapeHtml(report.root)}</title>
    <style>
        :root {
            --bg-color: #050505;
            --card-bg: #111111;
            --accent-color: #CCFF00;
            --alert-color: #FF4D4D;
            --text-primary: #ffffff;
            --text-secondary: #a0a0a0;
            --border-color: #222222;
        }

        body {
            font-family: system-ui, sans-serif;
            background-color: var(--bg-color);
            color: var(--text-primary);
            margin: 0;
            padding: 20px;
        }

        .container { max-width: 1200px; margin: 0 auto; }

        header {
            display: flex;
            justify-content: space-between;
            align-items: center;
            margin-bottom: 40px;
        }

        .logo {
            font-size: 2rem;
            font-weight: 800;
            color: var(--accent-color);
            letter-spacing: -1px;
        }

        .stats-grid {
            display: grid;
            grid-template-columns: repeat(auto-fit, minmax(220px, 1fr));
            gap: 20px;
            margin-bottom: 20px;
        }

        .card {
            background: var(--card-bg);
            border: 1px solid var(--border-color);
            border-radius: 16px;
            padding: 24px;
            margin-bottom: 20px;
        }

        .card h3 {
            margin: 0 0 10px 0;
            font-size: 0.9rem;
            color: var(--text-secondary);
            text-transform: uppercase;
            letter-spacing: 1px;
        }

        .card .value { font-size: 2.5rem; font-weight: 700; }

        table { width: 100%; border-collapse: collapse; }
        th {
            text-align: left;
            color: var(--text-secondary);
            font-size: 0.8rem;
            padding: 10px;
            border-bottom: 1px solid var(--border-color);
        }
        td { padding: 10px; font-size: 0.9rem; border-bottom: 1px solid var(--border-color); }

        .badge {
            background: rgba(204, 255, 0, 0.1);
            color: var(--accent-color);
            padding: 4px 12px;
            border-radius: 20px;
            font-weight: 600;
        }
        tr.over .badge { background: rgba(255, 77, 77, 0.15); color: var(--alert-color); }
        .muted, .failures { color: var(--text-secondary); }
    </style>
</head>
<body>
    <div class="container">
        <header>
            <div class="logo">SHCCN</div>
            <div class="date">${escapeHtml(new Date(report.timestamp).toLocaleString())}</div>
        </header>

        <div class="stats-grid">${card('Scripts', report.files.length)}${card('Lines', report.totals.lineCount)}${card('Functions', report.totals.functionCount)}${card('Max CCN', maxCcn, true)}${card(`Over CCN ${report.ccnThreshold}`, overThreshold)}
        </div>

        <div class="card wide">
            <h3>Files</h3>
            <table>
                <thead>
                    <tr><th>PATH</th><th>LINES</th><th>CODE</th><th>COMMENTS</th><th>BLANKS</th><th>FUNCTIONS</th></tr>
                </thead>
                <tbody>${fileRows(report)}
                </tbody>
            </table>
        </div>

        <div class="card wide">
            <h3>Functions by Complexity</h3>
            <table>
                <thead>
                    <tr><th>NAME</th><th>CODE</th><th>CCN</th></tr>
                </thead>
                <tbody>${functionRows(functions, report.ccnThreshold)}
                </tbody>
            </table>
        </div>
${failureList(report)}
    </div>
</body>
</html>`;
};
