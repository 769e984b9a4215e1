/**
 * CLI Library Index
 *
 * @module cli/lib
 */

export {
  type TriangulatorConfig,
  type LoadConfigOptions,
  ConfigurationError,
  DEFAULT_CONFIG,
  loadConfig,
  findConfigFile,
  parsePenalty,
  parseTolerance,
  parseLimit,
  parseFormat,
} from './config.js';

export { type CommandContext, createCommandContext, initializeContext } from './context.js';

export { EXIT_CODES, type ExitCode, exitCodeForError } from './exit-codes.js';

export {
  parseHintArgument,
  parseHintArguments,
  parseDistanceField,
  canonicalCountryName,
} from './hint-parser.js';

export { CLILogger, createCLILogger, type CLILoggerConfig } from './logger.js';

export {
  OUTPUT_FORMATS,
  type OutputFormat,
  type TableColumn,
  isOutputFormat,
  formatOutput,
  formatTable,
  formatJson,
  formatNdjson,
  formatCsv,
  formatters,
  jsonSafeNumber,
  printOutput,
  printError,
} from './output.js';
