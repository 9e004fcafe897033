/**
 * Python worker bridge
 *
 * Runs the scripts under python/ through python-shell. One-shot workers get
 * a JSON request on stdin and answer with a JSON line on stdout; persistent
 * workers answer one JSON line per request line.
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module services/python/worker
 */

import { PythonShell, type Options as PythonShellOptions } from 'python-shell';
import { existsSync } from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';

const __dirname = path.dirname(fileURLToPath(import.meta.url));

/**
 * Nearest python/ directory above this module holding the worker scripts.
 * Sources run from src/ and builds from dist/src/, so the depth differs.
 */
function findPythonDir(start: string): string {
  let dir = start;
  for (;;) {
    const candidate = path.join(dir, 'python');
    if (existsSync(path.join(candidate, 'extract_worker.py'))) return candidate;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(start, '..', '..', '..', 'python');
    dir = parent;
  }
}

/** Directory holding the worker scripts */
export const PYTHON_DIR = findPythonDir(__dirname);

type WorkerErrorCode = 'WORKER_TIMEOUT' | 'WORKER_FAILED' | 'PARSE_ERROR' | 'WORKER_REPORTED';

export class WorkerError extends Error {
  constructor(
    message: string,
    public readonly code: WorkerErrorCode,
    public readonly details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'WorkerError';
    Error.captureStackTrace?.(this, WorkerError);
  }
}

/** Max stderr accumulation: 10KB */
const MAX_STDERR_LENGTH = 10_240;

export interface WorkerRunOptions {
  pythonPath?: string;
  timeoutMs: number;
}

/**
 * Envelope every worker prints: `{ "success": true, ... }` or
 * `{ "success": false, "error": "..." }`
 */
interface WorkerEnvelope {
  success: boolean;
  error?: string | null;
}

function isEnvelope(value: unknown): value is WorkerEnvelope & Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'success' in value &&
    typeof value.success === 'boolean'
  );
}

/**
 * Parse the last JSON line of worker output; libraries may print other
 * lines to stdout before it.
 */
export function parseLastJsonLine(output: string): unknown {
  const lines = output.trim().split('\n');
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i].trim();
    if (!line.startsWith('{')) continue;
    try {
      return JSON.parse(line) as unknown;
    } catch (error) {
      console.error(
        '[PythonWorker] JSON parse failed for output line, trying previous:',
        error instanceof Error ? error.message : String(error)
      );
    }
  }
  throw new WorkerError('Failed to parse worker output as JSON', 'PARSE_ERROR', {
    output: output.substring(0, 1000),
  });
}

/**
 * Unwrap a worker envelope, raising the worker's own error message
 */
export function unwrapEnvelope(script: string, value: unknown): Record<string, unknown> {
  if (!isEnvelope(value)) {
    throw new WorkerError(`${script} returned an unexpected payload`, 'PARSE_ERROR', {
      payload: JSON.stringify(value).substring(0, 1000),
    });
  }
  if (!value.success) {
    throw new WorkerError(`${script} failed: ${value.error ?? 'unknown error'}`, 'WORKER_REPORTED');
  }
  return value;
}

/**
 * Run a one-shot worker script and return its unwrapped JSON envelope
 */
export function runPythonWorker(
  script: string,
  args: string[],
  stdin: string | undefined,
  options: WorkerRunOptions
): Promise<Record<string, unknown>> {
  return new Promise((resolve, reject) => {
    let settled = false;
    const shellOptions: PythonShellOptions = {
      mode: 'text',
      pythonPath: options.pythonPath,
      pythonOptions: ['-u'],
      scriptPath: PYTHON_DIR,
      args,
    };

    const shell = new PythonShell(script, shellOptions);
    let stderr = '';

    const timer = setTimeout(() => {
      if (settled) return;
      settled = true;
      try {
        shell.kill();
      } catch (error) {
        console.error(
          `[PythonWorker] Failed to kill ${script} on timeout:`,
          error instanceof Error ? error.message : String(error)
        );
      }
      reject(
        new WorkerError(`${script} timed out after ${options.timeoutMs}ms`, 'WORKER_TIMEOUT', {
          stderr: stderr.substring(0, 1000),
        })
      );
    }, options.timeoutMs);

    // Spawn failures (missing interpreter) arrive here, not through end()
    shell.on('error', (err: Error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;
      console.error(`[PythonWorker] ${script} could not start:`, err.message);
      reject(new WorkerError(`python worker failed to start: ${err.message}`, 'WORKER_FAILED', { script }));
    });
    shell.stdin.on('error', (err: Error) => {
      console.error(`[PythonWorker] ${script} stdin closed:`, err.message);
    });

    const outputChunks: string[] = [];
    shell.on('message', (msg: string) => {
      outputChunks.push(msg);
    });

    shell.on('stderr', (err: string) => {
      if (stderr.length < MAX_STDERR_LENGTH) {
        stderr += err + '\n';
      }
    });

    // end() closes stdin, so the request goes first
    if (stdin !== undefined) shell.send(stdin);

    shell.end((err?: Error) => {
      clearTimeout(timer);
      if (settled) return;
      settled = true;

      if (err) {
        console.error(`[PythonWorker] ${script} error:`, err.message);
        if (stderr) console.error('[PythonWorker] Stderr:', stderr.substring(0, 1000));
        reject(
          new WorkerError(`${script} failed: ${err.message}`, 'WORKER_FAILED', {
            stderr: stderr.substring(0, 1000),
          })
        );
        return;
      }

      try {
        resolve(unwrapEnvelope(script, parseLastJsonLine(outputChunks.join('\n'))));
      } catch (error) {
        reject(error);
      }
    });
  });
}

interface PendingRequest {
  resolve: (value: Record<string, unknown>) => void;
  reject: (error: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * Long-lived worker answering one JSON line per request line, in order.
 * The model inside the process is loaded once.
 */
export class PersistentPythonWorker {
  private shell: PythonShell | null = null;
  private readonly pending: PendingRequest[] = [];
  private stderr = '';

  constructor(
    private readonly script: string,
    private readonly options: WorkerRunOptions
  ) {}

  private start(): PythonShell {
    if (this.shell) return this.shell;

    const shell = new PythonShell(this.script, {
      mode: 'text',
      pythonPath: this.options.pythonPath,
      pythonOptions: ['-u'],
      scriptPath: PYTHON_DIR,
      args: ['--serve'],
    });

    shell.on('message', (line: string) => {
      if (!line.trim().startsWith('{')) return;
      const request = this.pending.shift();
      if (!request) return;
      clearTimeout(request.timer);
      try {
        request.resolve(unwrapEnvelope(this.script, JSON.parse(line) as unknown));
      } catch (error) {
        request.reject(
          error instanceof Error ? error : new WorkerError(String(error), 'PARSE_ERROR')
        );
      }
    });

    shell.on('stderr', (err: string) => {
      if (this.stderr.length < MAX_STDERR_LENGTH) this.stderr += err + '\n';
    });

    shell.on('close', () => {
      if (this.shell !== null && this.shell !== shell) return;
      this.shell = null;
      this.failAll(
        new WorkerError(`${this.script} exited`, 'WORKER_FAILED', {
          stderr: this.stderr.substring(0, 1000),
        })
      );
    });

    shell.on('pythonError', (err: Error) => {
      console.error(`[PythonWorker] ${this.script} error:`, err.message);
    });

    shell.on('error', (err: Error) => {
      console.error(`[PythonWorker] ${this.script} could not start:`, err.message);
      if (this.shell === shell) this.shell = null;
      this.failAll(
        new WorkerError(`python worker failed to start: ${err.message}`, 'WORKER_FAILED', { script: this.script })
      );
    });

    shell.stdin.on('error', (err: Error) => {
      console.error(`[PythonWorker] ${this.script} stdin closed:`, err.message);
    });

    this.shell = shell;
    return shell;
  }

  private failAll(error: WorkerError): void {
    for (const request of this.pending.splice(0)) {
      clearTimeout(request.timer);
      request.reject(error);
    }
  }

  request(payload: Record<string, unknown>): Promise<Record<string, unknown>> {
    const shell = this.start();
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        const index = this.pending.findIndex((p) => p.timer === timer);
        if (index !== -1) this.pending.splice(index, 1);
        reject(new WorkerError(`${this.script} timed out after ${this.options.timeoutMs}ms`, 'WORKER_TIMEOUT'));
        // The response order is lost once a request is abandoned
        this.close();
      }, this.options.timeoutMs);
      this.pending.push({ resolve, reject, timer });
      shell.send(JSON.stringify(payload));
    });
  }

  close(): void {
    const shell = this.shell;
    this.shell = null;
    if (!shell) return;
    try {
      shell.kill();
    } catch (error) {
      console.error(
        `[PythonWorker] Failed to stop ${this.script}:`,
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}
