import chalk from "chalk";
import debug from "debug";

const NAMESPACE = "evalflow";

export type LogFields = Readonly<Record<string, unknown>>;

export type Logger = {
  readonly debug: (message: string, fields?: LogFields) => void;
  readonly info: (message: string, fields?: LogFields) => void;
  readonly warn: (message: string, fields?: LogFields) => void;
  readonly error: (message: string, fields?: LogFields) => void;
};

function formatFields(fields: LogFields | undefined): string {
  if (!fields) {
    return "";
  }
  const entries = Object.entries(fields).filter(([, value]) => value !== undefined);
  if (entries.length === 0) {
    return "";
  }
  return ` ${JSON.stringify(Object.fromEntries(entries))}`;
}

/**
 * Creates a logger writing under the `evalflow:<context>` debug namespace.
 *
 * Enable everything with `DEBUG=evalflow:*`, or a single context with
 * `DEBUG=evalflow:service`.
 */
export function createLogger(context: string): Logger {
  const write = debug(`${NAMESPACE}:${context}`);
  const emit = (color: (text: string) => string, message: string, fields?: LogFields) => {
    write(`${color(message)}${formatFields(fields)}`);
  };
  return {
    debug: (message, fields) => emit(chalk.gray, message, fields),
    info: (message, fields) => emit(chalk.blue, message, fields),
    warn: (message, fields) => emit(chalk.yellow, message, fields),
    error: (message, fields) => emit(chalk.red, message, fields),
  };
}
