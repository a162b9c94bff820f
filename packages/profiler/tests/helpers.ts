import type { ToolResult, ToolRunner } from '../src/exec';

export type FakeTool = ToolRunner & { calls: string[] };

/** A tool runner answering from a table keyed by command name; unknown commands are not found. */
export const fakeTool = (responses: Record<string, ToolResult>): FakeTool => {
  const calls: string[] = [];
  const run: ToolRunner = async (command, args) => {
    calls.push([command, ...args].join(' '));
    return responses[command] ?? { ok: false, reason: 'not-found', detail: `${command} not found` };
  };
  return Object.assign(run, { calls });
};
