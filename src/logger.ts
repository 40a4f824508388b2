import chalk from 'chalk';

export type LogFunction = (message: string, details?: string) => void;

export interface Logger {
  debug: LogFunction;
  info: LogFunction;
  warn: LogFunction;
  error: LogFunction;
}

const noOp: LogFunction = () => {
  //
};

export const silentLogger: Logger = {
  debug: noOp,
  info: noOp,
  warn: noOp,
  error: noOp,
};

export interface TerminalLoggerOptions {
  quiet?: boolean;
  verbose?: boolean;
}

/** Log lines go to stderr; stdout carries the reports. */
export function createTerminalLogger(options: TerminalLoggerOptions = {}): Logger {
  const { quiet = false, verbose = false } = options;
  const write = (line: string, details?: string) => {
    console.error(line);
    if (details && verbose) console.error(chalk.gray(`   ${details}`));
  };

  return {
    debug: (message, details) => {
      if (verbose) write(chalk.gray(`  · ${message}`), details);
    },
    info: (message, details) => {
      if (!quiet) write(`  ${chalk.cyan('ℹ')} ${message}`, details);
    },
    warn: (message, details) => {
      if (!quiet) write(chalk.yellow(`  ⚠️  ${message}`), details);
    },
    error: (message, details) => write(chalk.red(`  ❌ ${message}`), details),
  };
}

export function errorDetails(err: unknown): { message: string; details: string } {
  if (err instanceof Error) {
    return { message: err.message, details: String(err.stack) };
  }
  return { message: 'Unknown error', details: JSON.stringify(err, null, 2) };
}
