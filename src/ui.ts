import * as p from "@clack/prompts";

export interface Spinner {
  start(message?: string): void;
  stop(message?: string): void;
}

export interface SpinnerLabels {
  start: string;
  done: string;
  failed: string;
}

/**
 * Runs `task` behind a spinner. The spinner is stopped on both paths, so an
 * error printed afterwards never lands on a spinning line.
 */
export async function withSpinner<T>(
  labels: SpinnerLabels,
  task: () => Promise<T>,
  spinner: Spinner = p.spinner()
): Promise<T> {
  spinner.start(labels.start);

  let result: T;
  try {
    result = await task();
  } catch (err) {
    spinner.stop(labels.failed);
    throw err;
  }

  spinner.stop(labels.done);
  return result;
}
