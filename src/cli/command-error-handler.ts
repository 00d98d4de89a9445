import chalk from 'chalk';
import { ClusterOrderingError, IssueEmissionError, describeErrorChain } from '../errors.js';
import { ConfigLoadError } from '../config/loader.js';

/**
 * Centralized error handler for CLI command actions.
 */
export function handleCommandError(err: unknown): never {
  if (err instanceof ConfigLoadError) {
    console.error(chalk.red(`Error: ${err.message}`));
  } else {
    const [head, ...causes] = describeErrorChain(err);
    console.error(chalk.red(`Error: ${head ?? 'unknown error'}`));
    for (const cause of causes) {
      console.error(chalk.yellow(`  caused by ${cause}`));
    }

    if (err instanceof IssueEmissionError) {
      console.error(chalk.yellow(`Issues reported before ${err.issueKey} keep their report; re-run to continue.`));
    } else if (err instanceof ClusterOrderingError) {
      console.error(chalk.yellow(`No report was emitted: cluster ${err.clusterKey} was not delivered contiguously.`));
    }
  }
  process.exit(1);
}

/**
 * Wrap an async commander action handler with standardized error handling.
 */
export function withCommandHandler<T extends unknown[]>(
  fn: (...args: T) => Promise<void>,
): (...args: T) => Promise<void> {
  return async (...args: T) => {
    try {
      await fn(...args);
    } catch (err: unknown) {
      handleCommandError(err);
    }
  };
}
