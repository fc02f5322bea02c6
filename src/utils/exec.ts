import { execFile, type ExecFileException } from 'node:child_process';

export type ExecOptions = {
  timeoutMs?: number;
  /** Written to the child's stdin, which is then closed. */
  input?: string;
};

export type ExecOutput = { stdout: string; stderr: string };

export class CommandError extends Error {
  readonly code: string | number | null;
  readonly stdout: string;
  readonly stderr: string;
  readonly timedOut: boolean;

  constructor(
    message: string,
    details: { code?: string | number | null; stdout?: string; stderr?: string; timedOut?: boolean } = {}
  ) {
    super(message);
    this.name = 'CommandError';
    this.code = details.code ?? null;
    this.stdout = details.stdout ?? '';
    this.stderr = details.stderr ?? '';
    this.timedOut = details.timedOut ?? false;
  }
}

export type CommandRunner = (command: string, args: string[], options?: ExecOptions) => Promise<ExecOutput>;

export function execFileAsync(command: string, args: string[], options: ExecOptions = {}) {
  return new Promise<ExecOutput>((resolve, reject) => {
    let finished = false;
    let timeout: NodeJS.Timeout | null = null;
    let child: ReturnType<typeof execFile> | null = null;

    const onComplete = (error: ExecFileException | null, stdout: string, stderr: string) => {
      if (finished) {
        return;
      }
      finished = true;
      if (timeout) {
        clearTimeout(timeout);
        timeout = null;
      }

      if (error) {
        const detail = stderr.trim();
        reject(
          new CommandError(detail ? `${error.message.trim()}: ${detail}` : error.message.trim(), {
            code: error.code ?? null,
            stdout,
            stderr
          })
        );
        return;
      }

      resolve({ stdout, stderr });
    };

    try {
      child = execFile(command, args, onComplete);
    } catch (error) {
      finished = true;
      reject(new CommandError(error instanceof Error ? error.message : String(error)));
      return;
    }

    if (typeof options.input === 'string' && child.stdin) {
      child.stdin.on('error', () => {
        // The child may exit before reading its input; the exit status reports the failure.
      });
      child.stdin.end(options.input);
    }

    const timeoutMs = options.timeoutMs ?? 0;
    if (timeoutMs > 0) {
      timeout = setTimeout(() => {
        if (finished) {
          return;
        }
        finished = true;
        child?.kill('SIGKILL');
        timeout = null;
        reject(
          new CommandError(`Command "${command}" timed out after ${timeoutMs}ms`, {
            code: 'ETIME',
            timedOut: true
          })
        );
      }, timeoutMs);
    }
  });
}

export function isTimeoutError(error: unknown) {
  return error instanceof CommandError && (error.code === 'ETIME' || error.timedOut);
}
