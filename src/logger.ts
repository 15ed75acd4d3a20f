let isVerbose = false;

export function initLogger(verbose: boolean): void {
  isVerbose = verbose;
}

// stdout carries the answer, so debug output goes to stderr
export function log(...args: unknown[]): void {
  if (isVerbose) {
    console.error('[clai]', ...args);
  }
}
