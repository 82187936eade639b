/**
 * lookup-enums CLI
 *
 * Usage: lookup-enums [options]
 *
 * Options:
 *   --config <path>   Path to the config file (default: lookup-enums.config.json)
 *   --output <path>   Output file, overrides the config file
 *   --table <regex>   Only generate for tables whose name matches
 *   --dry-run         Print the generated file instead of writing it
 *   --verbose         Log rule matches and queries
 *   --help            Show help
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { logger, setDebugLogging, tableReference } from '@lookup-enums/shared';
import type { TableMetadata } from '@lookup-enums/shared';
import { connectDatabase } from '@lookup-enums/db-introspector';
import type { DatabaseConnection, DatabaseSession } from '@lookup-enums/db-introspector';
import { compilePattern, EnumGenerator } from '@lookup-enums/enum-generator';
import type { GeneratedTable } from '@lookup-enums/enum-generator';
import { DEFAULT_CONFIG_PATH, loadConfig } from './config.js';
import type { ConfigResult } from './config.js';

export interface CLIOptions {
  configPath: string;
  outputPath?: string;
  tableFilter?: string;
  dryRun: boolean;
  verbose: boolean;
  help: boolean;
}

export interface CLIDependencies {
  loadConfig: (filePath: string) => Promise<ConfigResult>;
  connect: (connection: DatabaseConnection) => Promise<DatabaseSession>;
  writeOutput: (filePath: string, content: string) => Promise<void>;
  print: (text: string) => void;
}

export const HEADER_LINE = '// Generated by lookup-enums. Do not edit by hand.';

export function parseArgs(args: string[]): CLIOptions {
  const options: CLIOptions = {
    configPath: DEFAULT_CONFIG_PATH,
    dryRun: false,
    verbose: false,
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '--config':
        options.configPath = args[++i] ?? options.configPath;
        break;
      case '--output':
        options.outputPath = args[++i] ?? options.outputPath;
        break;
      case '--table':
        options.tableFilter = args[++i] ?? options.tableFilter;
        break;
      case '--dry-run':
        options.dryRun = true;
        break;
      case '--verbose':
        options.verbose = true;
        break;
      case '--help':
        options.help = true;
        break;
      default:
        if (arg && !arg.startsWith('-')) {
          options.configPath = arg;
        }
    }
  }

  return options;
}

export function helpText(): string {
  return `
lookup-enums

Generate TypeScript enums from the rows of lookup tables.

Usage: lookup-enums [options]

Options:
  --config <path>   Path to the config file (default: ${DEFAULT_CONFIG_PATH})
  --output <path>   Output file, overrides "output" in the config file
  --table <regex>   Only generate for tables whose name matches
  --dry-run         Print the generated file instead of writing it
  --verbose         Log rule matches and queries
  --help            Show this help message

Environment:
  LOOKUP_ENUMS_DB_PASSWORD   Database password when the config file has none
  LOOKUP_ENUMS_DEBUG=1       Same as --verbose

Examples:
  lookup-enums
  lookup-enums --config ./db/enums.json --output ./src/lookups.ts
  lookup-enums --table "^status" --dry-run
`;
}

/**
 * Assemble the output file from per-table texts, skipping empty ones
 */
export function renderOutputFile(
  results: GeneratedTable[],
  source: Pick<DatabaseConnection, 'type' | 'database'>
): string {
  const header = [HEADER_LINE, `// Source: ${source.type} database ${source.database}`, ''].join('\n');
  const sections = results
    .filter(result => result.text.length > 0)
    .map(result => `// Table ${tableReference(result.table)}\n${result.text}`);

  return `${header}\n${sections.join('\n')}`;
}

async function writeOutputFile(filePath: string, content: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, content, 'utf-8');
}

const defaultDependencies: CLIDependencies = {
  loadConfig: filePath => loadConfig(filePath),
  connect: connectDatabase,
  writeOutput: writeOutputFile,
  print: text => process.stdout.write(text),
};

function selectTables(tables: TableMetadata[], filter: RegExp | undefined): TableMetadata[] {
  return filter ? tables.filter(table => filter.test(table.name)) : tables;
}

/**
 * Run the CLI and resolve to the process exit code
 */
export async function runCLI(args: string[], deps: CLIDependencies = defaultDependencies): Promise<number> {
  const options = parseArgs(args);

  if (options.help) {
    deps.print(helpText());
    return 0;
  }

  if (options.verbose) {
    setDebugLogging(true);
  }

  let tableFilter: RegExp | undefined;
  if (options.tableFilter !== undefined) {
    const compiled = compilePattern(options.tableFilter);
    if (!compiled.ok) {
      logger.error(`Invalid --table pattern: ${compiled.reason}`);
      return 1;
    }
    tableFilter = compiled.regex;
  }

  const configPath = path.resolve(process.cwd(), options.configPath);
  const loaded = await deps.loadConfig(configPath);
  if (!loaded.success) {
    logger.error(loaded.error);
    return 1;
  }
  const { config } = loaded;

  let session: DatabaseSession;
  try {
    session = await deps.connect(config.connection);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Failed to connect to ${config.connection.type} database ${config.connection.database}: ${errorMessage}`);
    return 1;
  }

  try {
    const tables = selectTables(session.tables, tableFilter);
    logger.debug(`Generating enums for ${tables.length} of ${session.tables.length} table(s)`);

    const generator = new EnumGenerator({
      rules: config.rules,
      rowSource: session.rowSource,
      multiPrefix: config.multiPrefix,
      logger,
    });
    const results = await generator.generateAll(tables);
    const content = renderOutputFile(results, config.connection);
    const written = results.filter(result => result.text.length > 0).length;

    if (options.dryRun) {
      deps.print(content);
      return 0;
    }

    const outputPath = path.resolve(process.cwd(), options.outputPath ?? config.output);
    await deps.writeOutput(outputPath, content);
    logger.info(`✓ Wrote enums for ${written} table(s) to ${outputPath}`);
    return 0;
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    logger.error(`Generation failed: ${errorMessage}`);
    return 1;
  } finally {
    await session.rowSource.end();
  }
}
