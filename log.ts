import chalk from "chalk";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOpts {
  verbose?: boolean;
  write?: (line: string) => void;
}

// Diagnostics go to stderr so stdout carries nothing but result lines
export const createLogger = ({
  verbose = false,
  write = (line) => process.stderr.write(line + "\n"),
}: LoggerOpts = {}): Logger => ({
  debug: (message) => {
    if (verbose) write(chalk.gray(message));
  },
  info: (message) => write(chalk.white(message)),
  success: (message) => write(chalk.bold.green(message)),
  warn: (message) => write(chalk.yellow(`Warning: ${message}`)),
  error: (message) => write(chalk.bold.red(`Error: ${message}`)),
});

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  success: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
