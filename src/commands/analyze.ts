import ora from 'ora';
import chalk from 'chalk';
import open from 'open';
import fs from 'fs-extra';
import path from 'node:path';
import { scanProject } from '../analyzer/project.js';
import { generateDashboard } from '../dashboard/generator.js';
import { renderJsonReport } from '../report/json.js';
import { renderTextReport } from '../report/text.js';
import { getSettingsStore, resolveSettings } from '../config.js';
import { exitCodeFor } from '../errors.js';
import { consoleLogger } from '../logger.js';

export interface AnalyzeOptions {
    format?: string;
    threshold?: string;
    open: boolean;
    report: boolean;
}

const OUTPUT_DIR = '.shccn';

export const analyzeAction = async (paths: string[], options: AnalyzeOptions) => {
    const spinner = ora({ text: 'Analyzing shell scripts...', stream: process.stderr });

    try {
        const settings = resolveSettings(options, getSettingsStore());
        const cwd = process.cwd();
        const inputs = paths.length > 0 ? paths : ['.'];

        spinner.start();
        const report = await scanProject(inputs, { cwd, ccnThreshold: settings.ccnThreshold, logger: consoleLogger });
        spinner.stop();

        const output = settings.format === 'json'
            ? renderJsonReport(report)
            : renderTextReport(report.files, { ccnThreshold: settings.ccnThreshold, highlight: chalk.red });
        process.stdout.write(output.endsWith('\n') ? output : `${output}\n`);

        if (options.report || options.open) {
            const outputDir = path.join(cwd, OUTPUT_DIR);
            await fs.ensureDir(outputDir);

            if (options.report) {
                const reportPath = path.join(outputDir, 'report.json');
                await fs.writeJson(reportPath, report, { spaces: 2 });
                consoleLogger.info(`Report saved to ${chalk.cyan(reportPath)}`);
            }

            if (options.open) {
                const htmlPath = path.join(outputDir, 'index.html');
                await fs.writeFile(htmlPath, generateDashboard(report));
                consoleLogger.info(`Opening dashboard: ${htmlPath}`);
                await open(htmlPath);
            }
        }

        if (report.failures.length > 0) {
            spinner.fail(chalk.red(`${report.failures.length} file(s) could not be read.`));
            process.exitCode = 1;
        } else {
            spinner.succeed(chalk.green(`Analyzed ${report.files.length} file(s).`));
        }
    } catch (error) {
        spinner.fail(chalk.red('Analysis failed.'));
        consoleLogger.error(error instanceof Error ? error.message : String(error));
        process.exitCode = exitCodeFor(error);
    }
};
