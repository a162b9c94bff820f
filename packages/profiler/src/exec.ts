import { execFile } from 'node:child_process';

export const DEFAULT_TOOL_TIMEOUT_MS = 10_000;

export type ToolFailureReason = 'not-found' | 'timeout' | 'exit' | 'aborted' | 'error';

export type ToolResult =
  | { ok: true; stdout: string }
  | { ok: false; reason: ToolFailureReason; detail: string };

export type ToolRunOptions = {
  timeoutMs?: number;
  signal?: AbortSignal;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
};

export type ToolRunner = (command: string, args: string[], options?: ToolRunOptions) => Promise<ToolResult>;

type ExecFailure = Error & {
  code?: string | number | null;
  killed?: boolean;
  signal?: NodeJS.Signals | null;
};

const classifyFailure = (error: ExecFailure): ToolFailureReason => {
  if (error.name === 'AbortError' || error.code === 'ABORT_ERR') {
    return 'aborted';
  }
  if (error.code === 'ENOENT') {
    return 'not-found';
  }
  if (error.killed) {
    return 'timeout';
  }
  if (typeof error.code === 'number') {
    return 'exit';
  }
  return 'error';
};

const describeFailure = (command: string, reason: ToolFailureReason, error: ExecFailure, stderr: string): string => {
  switch (reason) {
    case 'not-found':
      return `${command} not found`;
    case 'timeout':
      return `${command} timed out`;
    case 'aborted':
      return `${command} aborted`;
    case 'exit': {
      const output = stderr.trim();
      return output ? `${command} exited with code ${error.code}: ${output}` : `${command} exited with code ${error.code}`;
    }
    default:
      return error.message;
  }
};

/** Run an external tool with a bounded timeout. Resolves with a failure value instead of rejecting. */
export const runTool: ToolRunner = (command, args, options = {}) =>
  new Promise((resolve) => {
    if (options.signal?.aborted) {
      resolve({ ok: false, reason: 'aborted', detail: `${command} aborted` });
      return;
    }
    execFile(
      command,
      args,
      {
        encoding: 'utf8',
        timeout: options.timeoutMs ?? DEFAULT_TOOL_TIMEOUT_MS,
        signal: options.signal,
        cwd: options.cwd,
        env: options.env,
        maxBuffer: 16 * 1024 * 1024,
        windowsHide: true,
      },
      (error, stdout, stderr) => {
        if (!error) {
          resolve({ ok: true, stdout });
          return;
        }
        const reason = classifyFailure(error);
        resolve({ ok: false, reason, detail: describeFailure(command, reason, error, stderr) });
      },
    );
  });
