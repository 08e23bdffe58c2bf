/** Outcome of one external tool invocation (git, tmux, gh, agent CLIs). */
export interface ToolResult {
  ok: boolean;
  exitCode: number;
  stdout: string;
  stderr: string;
}
