import chalk from "chalk";
import type { Logger } from "./types.js";

/**
 * Logger that prints to the console: info in the default colour, warnings
 * in yellow and errors in red. Colour is dropped when NO_COLOR is set.
 */
export function createConsoleLogger(): Logger {
  return {
    info: (message) => console.log(message),
    warn: (message) => console.warn(chalk.yellow(message)),
    error: (message) => console.error(chalk.red(message)),
  };
}

/** Logger that discards everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};
