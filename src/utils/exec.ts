import { exec as cpExec, type ExecException } from "child_process";

const DEFAULT_TIMEOUT = 15_000;
const DEFAULT_MAX_BUFFER = 32 * 1024 * 1024; // screencaps of large panels

export interface ExecOptions {
  timeout?: number;
  maxBuffer?: number;
}

/**
 * A shell command that exited non-zero, could not start, or was killed by
 * its timeout (`timedOut`).
 */
export class ExecError extends Error {
  constructor(
    readonly command: string,
    readonly detail: string,
    readonly timedOut: boolean,
  ) {
    super(
      timedOut
        ? `Command timed out: ${command}`
        : `Command failed: ${command}\n${detail}`,
    );
    this.name = "ExecError";
  }
}

function toExecError(
  command: string,
  error: ExecException,
  stderr: string,
): ExecError {
  const msg = stderr.trim() || error.message;
  // exec kills the child with SIGTERM once the timeout elapses
  const timedOut = error.killed === true && error.signal === "SIGTERM";
  return new ExecError(command, msg, timedOut);
}

export function exec(command: string, options?: ExecOptions): Promise<string> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const maxBuffer = options?.maxBuffer ?? DEFAULT_MAX_BUFFER;

  return new Promise((resolve, reject) => {
    cpExec(command, { timeout, maxBuffer }, (error, stdout, stderr) => {
      if (error) {
        reject(toExecError(command, error, stderr));
        return;
      }
      resolve(stdout);
    });
  });
}

export function execBuffer(
  command: string,
  options?: ExecOptions,
): Promise<Buffer> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const maxBuffer = options?.maxBuffer ?? DEFAULT_MAX_BUFFER;

  return new Promise((resolve, reject) => {
    cpExec(
      command,
      { timeout, maxBuffer, encoding: "buffer" },
      (error, stdout, stderr) => {
        if (error) {
          reject(toExecError(command, error, stderr.toString()));
          return;
        }
        resolve(stdout);
      },
    );
  });
}

/**
 * Runs a command with `input` piped to its stdin and resolves with stdout.
 */
export function execWithInput(
  command: string,
  input: Buffer,
  options?: ExecOptions,
): Promise<string> {
  const timeout = options?.timeout ?? DEFAULT_TIMEOUT;
  const maxBuffer = options?.maxBuffer ?? DEFAULT_MAX_BUFFER;

  return new Promise((resolve, reject) => {
    let stdinError: Error | undefined;
    const child = cpExec(
      command,
      { timeout, maxBuffer },
      (error, stdout, stderr) => {
        if (error) {
          reject(toExecError(command, error, stderr));
          return;
        }
        if (stdinError) {
          reject(new ExecError(command, stdinError.message, false));
          return;
        }
        resolve(stdout);
      },
    );
    child.stdin?.on("error", (err) => {
      stdinError = err;
    });
    child.stdin?.end(input);
  });
}
