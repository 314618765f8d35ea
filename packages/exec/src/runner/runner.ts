import { spawn, spawnSync } from 'child_process';
import os from 'os';
import { ProcessError, TimeoutError } from '@configbench/shared';
import type { CommandRunner, ProcessRunRequest, ProcessRunResult } from './types';

export const DEFAULT_MAX_OUTPUT_BYTES = 10 * 1024 * 1024;

const TRUNCATION_NOTICE = '\n[Output truncated due to limit]\n';

function killProcessTree(pid: number, signal: NodeJS.Signals = 'SIGTERM') {
  if (os.platform() === 'win32') {
    // process.kill does not reach grandchildren on Windows.
    spawnSync('taskkill', ['/PID', String(pid), '/T', '/F']);
    return;
  }
  // A negative PID signals the whole process group; the child is spawned detached for this.
  try {
    process.kill(-pid, signal);
  } catch {
    // Already exited.
  }
}

class OutputBuffer {
  private chunks: Buffer[] = [];

  push(chunk: Buffer) {
    this.chunks.push(chunk);
  }

  toString(): string {
    return Buffer.concat(this.chunks).toString('utf8');
  }
}

export class ProcessRunner implements CommandRunner {
  async run(req: ProcessRunRequest): Promise<ProcessRunResult> {
    const maxOutputBytes = req.maxOutputBytes ?? DEFAULT_MAX_OUTPUT_BYTES;
    const stdout = new OutputBuffer();
    const stderr = new OutputBuffer();
    let outputBytes = 0;
    let truncated = false;

    if (req.signal?.aborted) {
      throw new ProcessError(`Command was cancelled before it started: ${req.command}`);
    }

    const start = Date.now();

    return new Promise<ProcessRunResult>((resolve, reject) => {
      let settled = false;
      const child = spawn(req.command, req.args ?? [], {
        cwd: req.cwd,
        env: { ...process.env, ...req.env },
        stdio: [req.input === undefined ? 'ignore' : 'pipe', 'pipe', 'pipe'],
        shell: req.shell ?? false,
        detached: true,
      });

      const finish = (action: () => void) => {
        if (settled) return;
        settled = true;
        clearTimeout(timeoutTimer);
        req.signal?.removeEventListener('abort', onAbort);
        action();
      };

      const terminate = () => {
        if (child.pid) {
          killProcessTree(child.pid, 'SIGTERM');
        }
      };

      const timeoutTimer = setTimeout(() => {
        terminate();
        finish(() =>
          reject(
            new TimeoutError(`Command timed out after ${req.timeoutMs}ms: ${req.command}`, {
              timeoutMs: req.timeoutMs,
              partialStdout: stdout.toString().slice(0, 1000),
              partialStderr: stderr.toString().slice(0, 1000),
            }),
          ),
        );
      }, req.timeoutMs);

      const onAbort = () => {
        terminate();
        finish(() => reject(new ProcessError(`Command was cancelled: ${req.command}`)));
      };
      req.signal?.addEventListener('abort', onAbort, { once: true });

      const collect = (target: OutputBuffer) => (chunk: Buffer) => {
        if (truncated) return;

        outputBytes += chunk.length;
        if (outputBytes > maxOutputBytes) {
          truncated = true;
          const room = Math.max(0, maxOutputBytes - (outputBytes - chunk.length));
          target.push(chunk.subarray(0, room));
          target.push(Buffer.from(TRUNCATION_NOTICE));
          terminate();
        } else {
          target.push(chunk);
        }
      };

      child.stdout?.on('data', collect(stdout));
      child.stderr?.on('data', collect(stderr));

      if (req.input !== undefined && child.stdin) {
        // The child may exit before reading all of its input.
        child.stdin.on('error', (err: Error) => {
          if ('code' in err && err.code === 'EPIPE') return;
          terminate();
          finish(() => reject(new ProcessError(`Failed to write input: ${err.message}`, { cause: err })));
        });
        child.stdin.end(req.input);
      }

      child.on('error', (err) => {
        finish(() => reject(new ProcessError(`Failed to start process: ${err.message}`, { cause: err })));
      });

      child.on('close', (code) => {
        finish(() =>
          resolve({
            exitCode: code ?? -1,
            stdout: stdout.toString(),
            stderr: stderr.toString(),
            durationMs: Date.now() - start,
            truncated,
          }),
        );
      });
    });
  }
}
