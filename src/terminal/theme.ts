import chalk from "chalk";

export const theme = {
  heading: (text: string) => chalk.bold.cyan(text),
  success: (text: string) => chalk.green(text),
  warn: (text: string) => chalk.yellow(text),
  error: (text: string) => chalk.red(text),
  muted: (text: string) => chalk.gray(text),
  command: (text: string) => chalk.bold(text),
};
