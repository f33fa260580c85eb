#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import * as fs from 'fs';
import * as path from 'path';
import { formatRangeRef } from './cell-ref';
import { errorMessage } from './errors';
import { EXPORT_FORMATS, exportSheet, exportWorkbook, isExportFormat } from './export';
import type { DecodeWarning, OpenOptions } from './types';
import { tryOpenWorkbook } from './workbook';
import type { Workbook } from './workbook';

interface CommonOptions {
  json?: boolean;
  verbose?: boolean;
  quiet?: boolean;
  maxSize?: string;
  extensionCheck: boolean;
}

interface InfoOptions extends CommonOptions {
  detailed?: boolean;
}

interface MergedOptions extends CommonOptions {
  sheet?: string;
}

interface DumpOptions extends CommonOptions {
  format: string;
  sheet?: string;
  output?: string;
  nrows?: string;
  skipEmptyArea: boolean;
}

type Spinner = ReturnType<typeof ora>;

const WARNING_PREVIEW = 10;

const program = new Command();

program
  .name('sheetwise')
  .description('Read XLS, XLSX, XLSB and ODS workbooks from the command line')
  .version('1.0.0');

function withCommonOptions(command: Command): Command {
  return command
    .option('--json', 'JSON output for automation')
    .option('-v, --verbose', 'Detailed operation output')
    .option('-q, --quiet', 'Minimal output for automation')
    .option('--max-size <bytes>', 'Largest file accepted, in bytes')
    .option('--no-extension-check', 'Accept files without a spreadsheet extension');
}

function openOptions(options: CommonOptions): OpenOptions {
  const open: OpenOptions = { checkExtension: options.extensionCheck };
  if (options.maxSize !== undefined) open.maxFileSize = Number(options.maxSize);
  return open;
}

/** Sheet argument as given: a number selects by index, anything else by name. */
function sheetRef(value: string): number | string {
  return /^\d+$/.test(value) ? Number(value) : value;
}

function openOrExit(input: string, options: CommonOptions, spinner: Spinner): Workbook {
  const result = tryOpenWorkbook(input, openOptions(options));
  if (!result.success) {
    spinner.fail('Failed to open workbook');
    if (options.json) {
      console.log(JSON.stringify({ status: 'error', code: result.code, errors: result.errors }, null, 2));
    } else {
      console.error(chalk.red('Errors:'));
      result.errors.forEach((error) => console.error(chalk.red(`  • ${error}`)));
    }
    process.exit(1);
  }
  return result.workbook;
}

function printWarnings(warnings: DecodeWarning[], options: CommonOptions): void {
  if (options.quiet || options.json || warnings.length === 0) return;
  const shown = options.verbose ? warnings : warnings.slice(0, WARNING_PREVIEW);
  console.log(chalk.yellow('\nWarnings:'));
  shown.forEach((warning) => {
    const where = warning.sheet === undefined ? '' : chalk.gray(` [${warning.sheet}]`);
    console.log(chalk.yellow(`  • ${warning.code}: ${warning.message}`) + where);
  });
  if (shown.length < warnings.length) {
    console.log(chalk.gray(`  ... ${warnings.length - shown.length} more (use --verbose to list all)`));
  }
}

function failAndExit(spinner: Spinner, label: string, error: unknown): never {
  spinner.fail(label);
  console.error(chalk.red(errorMessage(error)));
  process.exit(1);
}

withCommonOptions(
  program
    .command('info')
    .description('Display workbook information')
    .argument('<input>', 'Input file path (XLS, XLSX, XLSB, ODS)')
    .option('--detailed', 'Show detailed sheet information'),
).action((input: string, options: InfoOptions) => {
  const spinner = ora({ text: 'Reading workbook...', isSilent: options.quiet || options.json }).start();
  const workbook = openOrExit(input, options, spinner);

  try {
    const sheets = workbook.sheetsMetadata();
    spinner.stop();

    if (options.json) {
      console.log(
        JSON.stringify(
          {
            file: path.basename(input),
            format: workbook.format,
            epoch: workbook.epoch,
            size: workbook.source.fileSize,
            sha256: workbook.source.hash,
            sheets,
            warnings: workbook.warnings(),
          },
          null,
          2,
        ),
      );
      return;
    }

    console.log(chalk.blue.bold(`\n${path.basename(input)}`));
    console.log(chalk.gray('─'.repeat(50)));
    console.log(`${chalk.yellow('Format:')} ${workbook.format.toUpperCase()}`);
    console.log(`${chalk.yellow('Date system:')} ${workbook.epoch}`);
    console.log(`${chalk.yellow('Size:')} ${workbook.source.fileSize.toLocaleString()} bytes`);
    if (options.verbose) console.log(`${chalk.yellow('SHA-256:')} ${workbook.source.hash}`);
    console.log(`${chalk.yellow('Sheets:')} ${sheets.length}`);

    if (options.detailed) {
      console.log(chalk.gray('\nSheet Details:'));
      sheets.forEach((sheet) => {
        const range = sheet.dimensions ? formatRangeRef(sheet.dimensions.start, sheet.dimensions.end) : 'not declared';
        console.log(`  ${chalk.cyan(sheet.name)}`);
        console.log(`     Type: ${sheet.type}, Visibility: ${sheet.visibility}`);
        console.log(`     Range: ${range}`);
      });
    } else {
      console.log(`  ${sheets.map((sheet) => sheet.name).join(', ')}`);
    }
    printWarnings(workbook.warnings(), options);
  } catch (error) {
    failAndExit(spinner, 'Information extraction failed', error);
  } finally {
    workbook.close();
  }
});

withCommonOptions(
  program
    .command('sheets')
    .description('List the sheets of a workbook in order')
    .argument('<input>', 'Input file path'),
).action((input: string, options: CommonOptions) => {
  const spinner = ora({ text: 'Reading sheet list...', isSilent: options.quiet || options.json }).start();
  const workbook = openOrExit(input, options, spinner);
  spinner.stop();

  const sheets = workbook.sheetsMetadata();
  if (options.json) {
    console.log(JSON.stringify(sheets, null, 2));
  } else {
    sheets.forEach((sheet) => {
      const flags = sheet.visibility === 'visible' ? '' : chalk.gray(` (${sheet.visibility})`);
      const kind = sheet.type === 'worksheet' ? '' : chalk.gray(` [${sheet.type}]`);
      console.log(`${chalk.gray(`${sheet.index}.`)} ${chalk.cyan(sheet.name)}${kind}${flags}`);
    });
  }
  workbook.close();
});

withCommonOptions(
  program
    .command('names')
    .description('List defined names and the ranges they refer to')
    .argument('<input>', 'Input file path'),
).action((input: string, options: CommonOptions) => {
  const spinner = ora({ text: 'Reading defined names...', isSilent: options.quiet || options.json }).start();
  const workbook = openOrExit(input, options, spinner);
  spinner.stop();

  const entries = workbook.definedNameEntries();
  if (options.json) {
    console.log(JSON.stringify(entries, null, 2));
  } else if (entries.length === 0) {
    console.log(chalk.yellow('No defined names'));
  } else {
    entries.forEach((entry) => {
      const scope = entry.scope === null ? '' : chalk.gray(` (${entry.scope})`);
      console.log(`${chalk.cyan(entry.name)}${scope} = ${entry.reference}`);
    });
  }
  printWarnings(workbook.warnings(), options);
  workbook.close();
});

withCommonOptions(
  program
    .command('merged')
    .description('List merged cell ranges')
    .argument('<input>', 'Input file path')
    .option('-s, --sheet <sheet>', 'Sheet name or index (default: every sheet)'),
).action((input: string, options: MergedOptions) => {
  const spinner = ora({ text: 'Reading merged ranges...', isSilent: options.quiet || options.json }).start();
  const workbook = openOrExit(input, options, spinner);

  try {
    const refs = options.sheet === undefined ? workbook.sheetNames() : [sheetRef(options.sheet)];
    const report = refs.map((ref) => ({ sheet: workbook.sheetMetadata(ref).name, ranges: workbook.mergedRanges(ref) }));
    spinner.stop();

    if (options.json) {
      console.log(JSON.stringify(report, null, 2));
      return;
    }
    report.forEach(({ sheet, ranges }) => {
      console.log(`${chalk.cyan(sheet)}: ${ranges.length === 0 ? chalk.gray('none') : ranges.map((range) => range.ref).join(', ')}`);
    });
    printWarnings(workbook.warnings(), options);
  } catch (error) {
    failAndExit(spinner, 'Reading merged ranges failed', error);
  } finally {
    workbook.close();
  }
});

withCommonOptions(
  program
    .command('dump')
    .description('Extract cell data as JSON, CSV, TSV, YAML or Markdown')
    .argument('<input>', 'Input file path')
    .option('-f, --format <format>', `Output format (${EXPORT_FORMATS.join('|')})`, 'json')
    .option('-s, --sheet <sheet>', 'Sheet name or index to extract')
    .option('-o, --output <path>', 'Output file path')
    .option('-n, --nrows <count>', 'Stop after this many rows')
    .option('--no-skip-empty-area', 'Start the grid at A1 instead of the first populated cell'),
).action((input: string, options: DumpOptions) => {
  const format = options.format.toLowerCase();
  if (!isExportFormat(format)) {
    console.error(chalk.red(`Unsupported output format: ${options.format}`));
    process.exit(1);
  }
  const spinner = ora({ text: 'Extracting data...', isSilent: options.quiet || !options.output }).start();
  const workbook = openOrExit(input, options, spinner);

  try {
    const exportOptions = {
      nrows: options.nrows === undefined ? undefined : Number(options.nrows),
      skipEmptyArea: options.skipEmptyArea,
    };
    const output =
      options.sheet === undefined
        ? exportWorkbook(workbook, format, exportOptions)
        : exportSheet(workbook, sheetRef(options.sheet), format, exportOptions);

    if (options.output) {
      fs.writeFileSync(options.output, output, 'utf8');
      spinner.succeed(`Data extracted to ${chalk.green(options.output)}`);
    } else {
      spinner.stop();
      console.log(output);
    }
    if (options.verbose) printWarnings(workbook.warnings(), options);
  } catch (error) {
    failAndExit(spinner, 'Extraction failed', error);
  } finally {
    workbook.close();
  }
});

withCommonOptions(
  program
    .command('validate')
    .description('Decode every sheet and report truncated sheets and cell problems')
    .argument('<input>', 'Input file path'),
).action((input: string, options: CommonOptions) => {
  const spinner = ora({ text: 'Validating workbook...', isSilent: options.quiet || options.json }).start();
  const workbook = openOrExit(input, options, spinner);

  const report = workbook.sheetNames().map((sheet) => {
    const cursor = workbook.openSheet(sheet);
    let rows = 0;
    for (let result = cursor.nextRow(); ; result = cursor.nextRow()) {
      if (result.kind === 'row') {
        rows++;
        continue;
      }
      return { sheet, rows, truncated: result.kind === 'truncated' ? result.error.message : null };
    }
  });
  const warnings = workbook.warnings();
  const valid = report.every((entry) => entry.truncated === null);
  workbook.close();

  if (options.json) {
    console.log(JSON.stringify({ valid, format: workbook.format, sheets: report, warnings }, null, 2));
  } else {
    if (valid) spinner.succeed(`${chalk.green('Workbook is readable')} (${workbook.format.toUpperCase()})`);
    else spinner.fail(chalk.red('Workbook has truncated sheets'));
    report.forEach((entry) => {
      const status = entry.truncated === null ? chalk.green('ok') : chalk.red(entry.truncated);
      console.log(`  ${chalk.cyan(entry.sheet)}: ${entry.rows} rows, ${status}`);
    });
    printWarnings(warnings, options);
  }
  if (!valid) process.exit(1);
});

// Global error handlers
process.on('uncaughtException', (error) => {
  console.error(chalk.red('Uncaught Exception:'), error.message);
  process.exit(1);
});

program.parse();
