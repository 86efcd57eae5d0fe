/**
 * Error module exports
 */

export {
  CliError,
  EXIT_CODES,
  ConfigError,
  InputError,
  OutputError,
  PgnError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError } from './handler.js';
