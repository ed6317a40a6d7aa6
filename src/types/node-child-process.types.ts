/**
 * Shape of the error thrown by `execFileSync` when the child process fails
 */
export interface ExecSyncError extends Error {
  /**
   * The exit code of the subprocess, or null if the subprocess terminated due to a signal.
   */
  status: number | null;

  /**
   * The signal used to kill the subprocess, or null if it was not killed by a signal.
   */
  signal: NodeJS.Signals | null;

  /**
   * Captured standard output of the subprocess.
   */
  stdout: Buffer | string;

  /**
   * Captured standard error of the subprocess.
   */
  stderr: Buffer | string;
}
