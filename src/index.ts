#!/usr/bin/env node
import { Command } from 'commander';
import { analyzeAction } from './commands/analyze.js';
import { configAction } from './commands/config.js';
import fs from 'fs-extra';
import path from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const pkgPath = path.join(__dirname, '../package.json');
const packageJson: { version: string } = fs.readJsonSync(pkgPath);

const program = new Command();

program
    .name('shccn')
    .description('Line counts and cyclomatic complexity for shell scripts')
    .version(packageJson.version);

program
    .command('analyze', { isDefault: true })
    .description('Report line counts and per-function CCN for shell scripts')
    .argument('[paths...]', 'files, directories or glob patterns', [])
    .option('-f, --format <format>', 'output format: text or json')
    .option('-t, --threshold <ccn>', 'highlight functions whose CCN exceeds this value')
    .option('--report', 'write .shccn/report.json', false)
    .option('--open', 'write .shccn/index.html and open it in the browser', false)
    .action(analyzeAction);

program
    .command('config')
    .description('Show or change stored defaults (threshold, format) or reset them')
    .argument('<key>', 'threshold, format or reset')
    .argument('[value]', 'new value')
    .action(configAction);

await program.parseAsync();
