/**
 * In-process output capture for command tests
 */

export interface CapturedOutput {
  output: {
    out(text: string): void;
    err(text: string): void;
    errIsTTY: boolean;
  };
  /** Everything written to stdout so far */
  readonly stdout: string;
  /** Everything written to stderr so far */
  readonly stderr: string;
}

/**
 * Create an output sink that records both streams
 */
export function captureOutput(): CapturedOutput {
  let stdout = "";
  let stderr = "";

  return {
    output: {
      out: (text) => {
        stdout += text;
      },
      err: (text) => {
        stderr += text;
      },
      errIsTTY: false,
    },
    get stdout() {
      return stdout;
    },
    get stderr() {
      return stderr;
    },
  };
}
