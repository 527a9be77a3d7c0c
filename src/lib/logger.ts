import chalk from "chalk";

export type LogLevel = "debug" | "info" | "success" | "warn" | "error";

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  debug?: boolean;
  write?: (line: string) => void;
  writeError?: (line: string) => void;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => console.log(line));
  const writeError = options.writeError ?? ((line: string) => console.error(line));

  return {
    debug(message) {
      if (options.debug) {
        writeError(chalk.dim(`debug: ${message}`));
      }
    },
    info(message) {
      write(message);
    },
    success(message) {
      write(chalk.green(message));
    },
    warn(message) {
      writeError(chalk.yellow(message));
    },
    error(message) {
      writeError(chalk.red(message));
    }
  };
}
