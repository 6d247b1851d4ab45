import chalk from "chalk";

const PREFIX = "[streamstat]";

let verbose = false;

export function setVerbose(enabled: boolean): void {
  verbose = enabled;
}

export function warn(message: string): void {
  console.warn(chalk.yellow(`${PREFIX} ${message}`));
}

export function detail(message: string): void {
  if (verbose) {
    console.error(chalk.gray(`${PREFIX} ${message}`));
  }
}
