import chalk from 'chalk';
import ora from 'ora';

/**
 * Output modes, set from the global CLI flags. Quiet wins over verbose.
 */
export function isVerbose(): boolean {
  return process.env.VERBOSE === 'true' && !isQuiet();
}

export function isQuiet(): boolean {
  return process.env.QUIET === 'true';
}

/**
 * The command's result on stdout, one line, for scripts.
 */
export function outputResult(data: string): void {
  console.log(data);
}

/**
 * Run a task behind a spinner in verbose mode, and plainly otherwise.
 * `done` builds the success line from the task's result.
 */
export async function withSpinner<T>(
  text: string,
  task: () => Promise<T>,
  done: (result: T) => string
): Promise<T> {
  if (!isVerbose()) {
    return task();
  }

  const spinner = ora(text).start();
  try {
    const result = await task();
    spinner.succeed(chalk.green(done(result)));
    return result;
  } catch (error) {
    spinner.fail(`${text.replace(/\.+$/, '')} failed`);
    throw error;
  }
}
