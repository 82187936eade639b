/**
 * Configuration file loading
 *
 * The config file is JSON validated with zod. The database password may be
 * left out of the file and supplied through LOOKUP_ENUMS_DB_PASSWORD.
 */

import * as fs from 'node:fs/promises';
import { z } from 'zod';
import { DatabaseTypeSchema } from '@lookup-enums/shared';
import type { DatabaseConnection } from '@lookup-enums/db-introspector';
import { compilePattern, DEFAULT_MULTI_PREFIX, parseRule } from '@lookup-enums/enum-generator';

export const DEFAULT_CONFIG_PATH = 'lookup-enums.config.json';
export const DEFAULT_OUTPUT_PATH = 'src/generated/lookup-enums.ts';
export const PASSWORD_ENV_VAR = 'LOOKUP_ENUMS_DB_PASSWORD';

export const DatabaseConnectionSchema = z.object({
  type: DatabaseTypeSchema,
  host: z.string().min(1, 'Host is required'),
  port: z.number().int().min(1).max(65535),
  database: z.string().min(1, 'Database name is required'),
  username: z.string().min(1, 'Username is required'),
  password: z.string().optional(), // Falls back to the environment
  ssl: z.boolean().optional(),
  schemaFilter: z.array(z.string()).optional(),
});

const RuleLineSchema = z
  .string()
  .trim()
  .min(1, 'Rule must not be empty')
  .superRefine((line, ctx) => {
    const compiled = compilePattern(parseRule(line).tableNamePattern);
    if (!compiled.ok) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid table pattern: ${compiled.reason}`,
      });
    }
  });

export const ConfigSchema = z.object({
  connection: DatabaseConnectionSchema,
  rules: z.array(RuleLineSchema).min(1, 'At least one rule is required'),
  multiPrefix: z.string().min(1).default(DEFAULT_MULTI_PREFIX),
  output: z.string().min(1).default(DEFAULT_OUTPUT_PATH),
});

export type ConfigFile = z.input<typeof ConfigSchema>;

export interface LookupEnumsConfig {
  connection: DatabaseConnection;
  rules: string[];
  multiPrefix: string;
  output: string;
}

export type ConfigResult =
  | { success: true; config: LookupEnumsConfig }
  | { success: false; error: string };

export type Environment = Record<string, string | undefined>;

/**
 * Flatten zod issues into `path: message` strings
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Validate parsed JSON and fill in defaults
 */
export function parseConfig(data: unknown, env: Environment = process.env): ConfigResult {
  const parsed = ConfigSchema.safeParse(data);
  if (!parsed.success) {
    return { success: false, error: formatIssues(parsed.error) };
  }

  const { connection, rules, multiPrefix, output } = parsed.data;
  return {
    success: true,
    config: {
      connection: {
        ...connection,
        password: connection.password ?? env[PASSWORD_ENV_VAR] ?? '',
      },
      rules,
      multiPrefix,
      output,
    },
  };
}

/**
 * Read and validate a config file
 */
export async function loadConfig(filePath: string, env: Environment = process.env): Promise<ConfigResult> {
  let content: string;
  try {
    content = await fs.readFile(filePath, 'utf-8');
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Cannot read config file ${filePath}: ${errorMessage}` };
  }

  let data: unknown;
  try {
    data = JSON.parse(content);
  } catch (error) {
    const errorMessage = error instanceof Error ? error.message : String(error);
    return { success: false, error: `Invalid JSON in config file ${filePath}: ${errorMessage}` };
  }

  return parseConfig(data, env);
}
