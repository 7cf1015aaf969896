import chalk from "chalk";

const prefix = chalk.bold("[scoped-timer]");

export interface Logger {
  info(msg: string): void;
  warn(msg: string): void;
}

export const log: Logger = {
  info: (msg: string) => console.log(`${prefix} ${msg}`),
  warn: (msg: string) => console.warn(`${prefix} ${chalk.yellow("⚠")} ${msg}`),
};
