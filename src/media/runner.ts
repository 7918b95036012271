import { execa, ExecaError } from 'execa';

export type ToolFailureReason = 'exit' | 'timeout' | 'cancelled' | 'spawn';

export class ToolInvocationError extends Error {
  constructor(
    readonly tool: string,
    readonly reason: ToolFailureReason,
    readonly exitCode: number | undefined,
    readonly stderr: string,
    options: { cause?: unknown } = {}
  ) {
    super(`${tool} ${reason}${exitCode === undefined ? '' : ` (exit ${exitCode})`}`, options);
    this.name = 'ToolInvocationError';
  }
}

export interface RunOptions {
  timeoutMs: number;
  signal?: AbortSignal;
}

export interface ToolResult {
  stdout: string;
  stderr: string;
}

/** Seam between the transform engine and the ffmpeg binaries. */
export interface ToolRunner {
  run(command: string, args: string[], options: RunOptions): Promise<ToolResult>;
}

export class ExecaToolRunner implements ToolRunner {
  async run(command: string, args: string[], options: RunOptions): Promise<ToolResult> {
    try {
      const result = await execa(command, args, {
        timeout: options.timeoutMs,
        cancelSignal: options.signal,
        stripFinalNewline: false,
      });
      return { stdout: result.stdout, stderr: result.stderr };
    } catch (error) {
      if (error instanceof ExecaError) {
        const stderr = typeof error.stderr === 'string' ? error.stderr : '';
        const reason: ToolFailureReason = error.timedOut
          ? 'timeout'
          : error.isCanceled
            ? 'cancelled'
            : error.exitCode === undefined
              ? 'spawn'
              : 'exit';
        throw new ToolInvocationError(command, reason, error.exitCode, stderr, { cause: error });
      }
      throw error;
    }
  }
}
