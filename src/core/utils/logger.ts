import chalk from "chalk";

const TAG = "[embedpack]";

export function logInfo(message: string) {
  console.log(chalk.cyan(`${TAG} ${message}`));
}

export function logWarn(message: string) {
  console.warn(chalk.yellow(`${TAG} ${message}`));
}

export function logError(message: string, err?: unknown) {
  console.error(chalk.red(`${TAG} ${message}`));
  if (err) console.error(err instanceof Error ? chalk.dim(err.message) : err);
}
