/**
 * progress.ts - Default progress reporter
 *
 * info goes to stdout; warn and error go to stderr, so piping stdout keeps
 * only the run's normal output.
 */

import type { ProgressReporter } from "./types";

export const consoleProgress: ProgressReporter = (message, level = "info") => {
  if (level === "info") {
    console.log(message); // eslint-disable-line no-console
  } else {
    console.error(message);
  }
};
