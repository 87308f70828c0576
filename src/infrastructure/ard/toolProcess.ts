import { spawn, type ChildProcess } from "child_process";
import { CancellationError, throwIfAborted } from "../../core/errors";
import type { ToolInvocation } from "../../ports/SensorPlugin";

const OUTPUT_TAIL_BYTES = 64 * 1024;
const DEFAULT_KILL_GRACE_MS = 5000;

export type ProcessExit = {
  code: number | null;
  signal: NodeJS.Signals | null;
  error?: Error;
};

export type ToolRunResult = ProcessExit & {
  timedOut: boolean;
  stdout: string;
  stderr: string;
  durationMs: number;
};

export type ToolRunOptions = {
  signal?: AbortSignal;
  killGraceMs?: number;
};

export type ToolRunner = (invocation: ToolInvocation, options?: ToolRunOptions) => Promise<ToolRunResult>;

const createTail = () => {
  let chunks: Buffer[] = [];
  let size = 0;
  return {
    push: (chunk: Buffer) => {
      chunks.push(chunk);
      size += chunk.length;
      while (size > OUTPUT_TAIL_BYTES && chunks.length > 1) {
        const dropped = chunks.shift();
        size -= dropped?.length ?? 0;
      }
    },
    text: () => {
      const joined = Buffer.concat(chunks);
      chunks = [joined];
      return joined.subarray(Math.max(0, joined.length - OUTPUT_TAIL_BYTES)).toString("utf8");
    }
  };
};

/**
 * Handle on a running external tool. `kill` asks politely and escalates to
 * SIGKILL after the grace period; `exited` settles once the child has been
 * reaped (or failed to spawn).
 */
export class ToolProcess {
  readonly exited: Promise<ProcessExit>;
  private readonly stdoutTail = createTail();
  private readonly stderrTail = createTail();
  private escalation?: NodeJS.Timeout;
  private done = false;

  private constructor(
    private readonly child: ChildProcess,
    private readonly killGraceMs: number
  ) {
    child.stdout?.on("data", (chunk: Buffer) => this.stdoutTail.push(chunk));
    child.stderr?.on("data", (chunk: Buffer) => this.stderrTail.push(chunk));

    this.exited = new Promise<ProcessExit>((resolve) => {
      child.on("error", (error) => {
        // Without a pid the child never started and no `close` will follow.
        if (child.pid === undefined) {
          this.settle();
          resolve({ code: null, signal: null, error });
          return;
        }
        // A running child (e.g. a failed kill) is still reaped through `close`.
        // eslint-disable-next-line no-console
        console.warn(JSON.stringify({ event: "tool.error", pid: child.pid, reason: error.message }));
      });
      child.once("close", (code, signal) => {
        this.settle();
        resolve({ code, signal });
      });
    });
  }

  static spawn(invocation: ToolInvocation, killGraceMs = DEFAULT_KILL_GRACE_MS): ToolProcess {
    const child = spawn(invocation.program, invocation.args, {
      cwd: invocation.cwd,
      env: invocation.env ? { ...process.env, ...invocation.env } : process.env,
      stdio: ["ignore", "pipe", "pipe"]
    });
    return new ToolProcess(child, killGraceMs);
  }

  get pid(): number | undefined {
    return this.child.pid;
  }

  get running(): boolean {
    return !this.done;
  }

  stdout(): string {
    return this.stdoutTail.text();
  }

  stderr(): string {
    return this.stderrTail.text();
  }

  kill(): void {
    if (this.done || this.escalation) return;
    this.child.kill("SIGTERM");
    this.escalation = setTimeout(() => {
      if (!this.done) this.child.kill("SIGKILL");
    }, this.killGraceMs);
    this.escalation.unref();
  }

  async terminate(): Promise<ProcessExit> {
    this.kill();
    return this.exited;
  }

  private settle(): void {
    this.done = true;
    if (this.escalation) clearTimeout(this.escalation);
  }
}

/**
 * Runs `fn` with a freshly spawned tool. Whatever way `fn` leaves, the child
 * is killed and reaped before this resolves or rejects.
 */
export const withToolProcess = async <T>(
  invocation: ToolInvocation,
  fn: (proc: ToolProcess) => Promise<T>,
  killGraceMs?: number
): Promise<T> => {
  const proc = ToolProcess.spawn(invocation, killGraceMs);
  try {
    return await fn(proc);
  } finally {
    if (proc.running) await proc.terminate();
  }
};

export const runToolInvocation: ToolRunner = async (invocation, options = {}) => {
  const { signal, killGraceMs } = options;
  throwIfAborted(signal);
  const startedAt = Date.now();

  return withToolProcess(
    invocation,
    async (proc) => {
      let timedOut = false;
      let cancelled = false;
      const timer = setTimeout(() => {
        timedOut = true;
        proc.kill();
      }, invocation.timeoutMs);
      const onAbort = () => {
        cancelled = true;
        proc.kill();
      };
      signal?.addEventListener("abort", onAbort, { once: true });

      let exit: ProcessExit;
      try {
        exit = await proc.exited;
      } finally {
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
      }

      if (cancelled) throw new CancellationError(`${invocation.program} cancelled`);
      return {
        ...exit,
        timedOut,
        stdout: proc.stdout(),
        stderr: proc.stderr(),
        durationMs: Date.now() - startedAt
      };
    },
    killGraceMs
  );
};
