// Command execution layer. Every slapt-get invocation passes through this module.
// LocalExecutor.execute() is the hard boundary between the reconciler and the OS:
// it resolves with the exit code and captured output and never rejects, so callers
// decide what a nonzero exit means.
import { execFile, type ExecFileException } from "node:child_process";
import type { Command } from "../types/command.js";

/** Result of command execution. */
export interface ExecResult {
  readonly stdout: string;
  readonly stderr: string;
  readonly exitCode: number;
  readonly durationMs: number;
}

/** The only view of process execution the reconciler has. */
export interface Executor {
  /** timeoutMs of 0 waits until the process exits. */
  execute(command: Command, timeoutMs: number): Promise<ExecResult>;
}

export interface LocalExecutorOptions {
  readonly maxBufferBytes: number;
}

/** Local executor using child_process. No shell is involved; argv goes straight to execve. */
export class LocalExecutor implements Executor {
  constructor(private readonly options: LocalExecutorOptions = { maxBufferBytes: 10 * 1024 * 1024 }) {}

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    const start = performance.now();
    const [cmd, ...args] = command.argv;
    if (cmd === undefined) {
      return { stdout: "", stderr: "empty argv", exitCode: 127, durationMs: 0 };
    }

    return new Promise<ExecResult>((resolve) => {
      execFile(
        cmd,
        args,
        {
          timeout: timeoutMs,
          maxBuffer: this.options.maxBufferBytes,
          env: command.env ? { ...process.env, ...command.env } : process.env,
        },
        (error, stdout, stderr) => {
          const durationMs = Math.round(performance.now() - start);
          resolve({
            stdout,
            stderr: stderrOf(error, stderr, timeoutMs),
            exitCode: exitCodeOf(error),
            durationMs,
          });
        },
      );
    });
  }
}

function stderrOf(error: ExecFileException | null, stderr: string, timeoutMs: number): string {
  if (!error) return stderr;
  // Spawn failures (ENOENT, EACCES) and buffer overruns produce no stderr of their own
  if (typeof error.code === "string") return stderr || error.message;
  if (error.killed || error.signal) {
    const reason = error.killed && timeoutMs > 0
      ? `killed by ${error.signal ?? "SIGTERM"} after the ${timeoutMs} ms timeout`
      : `killed by ${error.signal ?? "a signal"}`;
    return stderr ? `${stderr.trimEnd()}\n${reason}` : reason;
  }
  return stderr;
}

function exitCodeOf(error: ExecFileException | null): number {
  if (!error) return 0;
  if (typeof error.code === "number") return error.code;
  // Not-found and not-executable follow the shell's conventions
  if (error.code === "ENOENT") return 127;
  if (error.code === "EACCES") return 126;
  return 1;
}

/**
 * Decorator that remembers every command line it ran, in order.
 * The tool layer reports these back as `commands_executed`.
 */
export class RecordingExecutor implements Executor {
  readonly executed: string[] = [];

  constructor(private readonly inner: Executor) {}

  async execute(command: Command, timeoutMs: number): Promise<ExecResult> {
    this.executed.push(command.argv.join(" "));
    return this.inner.execute(command, timeoutMs);
  }
}
