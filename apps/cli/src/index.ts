/**
 * @lookup-enums/cli
 *
 * Command-line host: loads the config file, connects to the database and
 * writes the generated enums.
 */

export {
  parseArgs,
  helpText,
  renderOutputFile,
  runCLI,
  HEADER_LINE,
  type CLIOptions,
  type CLIDependencies,
} from './cli.js';

export {
  ConfigSchema,
  DatabaseConnectionSchema,
  parseConfig,
  loadConfig,
  formatIssues,
  DEFAULT_CONFIG_PATH,
  DEFAULT_OUTPUT_PATH,
  PASSWORD_ENV_VAR,
  type ConfigFile,
  type ConfigResult,
  type Environment,
  type LookupEnumsConfig,
} from './config.js';
