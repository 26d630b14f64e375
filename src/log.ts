let verbose = process.env.VERBOSE === 'true';

/**
 * Turns debugLog output on or off. Starts from VERBOSE=true in the environment.
 */
export function setVerbose(on: boolean): void {
  verbose = on;
}

/**
 * Conditional console.log for step-by-step progress, quiet by default.
 */
export function debugLog(...args: unknown[]): void {
  if (verbose) {
    console.log(...args);
  }
}
