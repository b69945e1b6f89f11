import chalk from "chalk";

export function logError(...args: string[]) {
  console.error(chalk.red("error") + ":", ...args);
}

export function logWarning(...args: string[]) {
  console.warn(chalk.yellow("warning") + ":", ...args);
}

export function logInfo(...args: string[]) {
  console.log(chalk.green("wrote") + ":", ...args);
}

/** Logs an error followed by every error in its `cause` chain */
export function logErrorChain(error: unknown) {
  logError(errorMessage(error));

  let cause = error instanceof Error ? error.cause : undefined;

  while (cause !== undefined) {
    console.error(chalk.dim("caused by") + ":", errorMessage(cause));
    cause = cause instanceof Error ? cause.cause : undefined;
  }
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
