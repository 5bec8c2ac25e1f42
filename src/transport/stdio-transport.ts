/**
 * Stdio Transport — JSONL over a child process's stdin/stdout.
 * The child's stderr is forwarded to the logger, never parsed.
 */

import { spawn } from 'node:child_process';
import { createInterface, type Interface } from 'node:readline';
import { ConnectionLostError, ProtocolViolationError } from '../protocol/errors.js';
import { silentLogger, type Logger } from '../utils/logger.js';
import { LineQueue } from './line-queue.js';
import type {
  ChildHandle,
  ExitInfo,
  SpawnProcess,
  StdioTransportOptions,
  Transport,
} from './types.js';

const DEFAULT_TERMINATE_GRACE_MS = 2_000;
const DEFAULT_STARTUP_TIMEOUT_MS = 10_000;

const defaultSpawn: SpawnProcess = (command, args, options) => spawn(command, args, options);

export class StdioTransport implements Transport {
  private readonly command: string;
  private readonly args: string[];
  private readonly cwd?: string;
  private readonly env?: Record<string, string>;
  private readonly terminateGraceMs: number;
  private readonly startupTimeoutMs: number;
  private readonly spawnProcess: SpawnProcess;
  private readonly logger: Logger;

  private child: ChildHandle | null = null;
  private stdoutReader: Interface | null = null;
  private stderrReader: Interface | null = null;
  private readonly lines = new LineQueue<string>();
  private readonly exitListeners = new Set<(info: ExitInfo) => void>();
  private exitInfo: ExitInfo | null = null;
  private exited: Promise<ExitInfo> | null = null;

  constructor(opts: StdioTransportOptions & { logger?: Logger }) {
    this.command = opts.command;
    this.args = opts.args ?? [];
    this.cwd = opts.cwd;
    this.env = opts.env;
    this.terminateGraceMs = opts.terminateGraceMs ?? DEFAULT_TERMINATE_GRACE_MS;
    this.startupTimeoutMs = opts.startupTimeoutMs ?? DEFAULT_STARTUP_TIMEOUT_MS;
    this.spawnProcess = opts.spawn ?? defaultSpawn;
    this.logger = opts.logger ?? silentLogger;
  }

  get running(): boolean {
    return this.child !== null && this.exitInfo === null;
  }

  get pid(): number | undefined {
    return this.child?.pid;
  }

  async start(): Promise<void> {
    if (this.child) throw new ProtocolViolationError('Transport already started');

    const child = this.spawnProcess(this.command, this.args, {
      cwd: this.cwd,
      env: this.env ? { ...process.env, ...this.env } : process.env,
      stdio: ['pipe', 'pipe', 'pipe'],
    });
    this.child = child;

    const { stdin, stdout, stderr } = child;
    if (!stdin || !stdout) {
      child.kill('SIGKILL');
      throw new ConnectionLostError(`Failed to open stdio pipes for ${this.command}`);
    }

    // Writes to a dead child surface through sendLine's callback; keep the stream quiet.
    stdin.on('error', (err: Error) => {
      this.logger.debug(`stdin error: ${err.message}`);
    });
    child.on('error', (err: Error) => {
      this.logger.warn(`Process ${this.command} error: ${err.message}`);
    });

    this.exited = new Promise<ExitInfo>((resolve) => {
      child.on('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        const info = { code, signal };
        this.exitInfo = info;
        this.logger.debug(`Process ${this.command} exited (code ${code}, signal ${signal})`);
        for (const listener of this.exitListeners) listener(info);
        resolve(info);
        // A grandchild may still hold stdout open; stop reading once already-emitted lines are queued.
        setImmediate(() => {
          this.stdoutReader?.close();
          this.stderrReader?.close();
        });
      });
    });

    const reader = createInterface({ input: stdout, crlfDelay: Infinity });
    this.stdoutReader = reader;
    reader.on('line', (line: string) => this.lines.push(line));
    reader.on('close', () => {
      this.lines.close(new ConnectionLostError(`Output of ${this.command} closed`));
    });

    if (stderr) {
      const errReader = createInterface({ input: stderr, crlfDelay: Infinity });
      this.stderrReader = errReader;
      errReader.on('line', (line: string) => this.logger.debug(`[stderr] ${line}`));
    }

    await this.waitForSpawn(child);
    this.logger.info(`Started ${this.command} ${this.args.join(' ')}`.trim() + ` (pid ${child.pid ?? '?'})`);
  }

  async sendLine(text: string): Promise<void> {
    if (text.includes('\n')) {
      throw new ProtocolViolationError('Frame contains an embedded newline');
    }
    const stdin = this.child?.stdin;
    if (!stdin || !this.running || stdin.writableEnded) {
      throw new ConnectionLostError(`Cannot write: ${this.command} is not running`);
    }

    await new Promise<void>((resolve, reject) => {
      stdin.write(text + '\n', 'utf-8', (err?: Error | null) => {
        if (err) reject(new ConnectionLostError(`Write to ${this.command} failed: ${err.message}`));
        else resolve();
      });
    });
  }

  receiveLine(timeoutMs?: number, signal?: AbortSignal): Promise<string> {
    if (!this.child) {
      return Promise.reject(new ConnectionLostError('Transport not started'));
    }
    return this.lines.take(timeoutMs, signal);
  }

  async terminate(graceMs = this.terminateGraceMs): Promise<void> {
    const child = this.child;
    const exited = this.exited;
    if (!child || !exited) return;

    if (this.exitInfo === null) {
      child.stdin?.end();
      child.kill('SIGTERM');

      const graceful = await settlesWithin(exited, graceMs);

      if (!graceful) {
        this.logger.warn(`${this.command} ignored SIGTERM for ${graceMs}ms, sending SIGKILL`);
        child.kill('SIGKILL');
        await exited;
      }
    }

    this.stdoutReader?.close();
    this.stderrReader?.close();
  }

  onExit(listener: (info: ExitInfo) => void): () => void {
    if (this.exitInfo) {
      listener(this.exitInfo);
      return () => {};
    }
    this.exitListeners.add(listener);
    return () => {
      this.exitListeners.delete(listener);
    };
  }

  private waitForSpawn(child: ChildHandle): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const timer = setTimeout(() => {
        cleanup();
        child.kill('SIGKILL');
        reject(new ConnectionLostError(`${this.command} did not start within ${this.startupTimeoutMs}ms`));
      }, this.startupTimeoutMs);

      const onSpawn = (): void => {
        cleanup();
        resolve();
      };
      const onError = (err: Error): void => {
        cleanup();
        this.exitInfo = { code: null, signal: null };
        this.lines.close(new ConnectionLostError(`Failed to launch ${this.command}: ${err.message}`));
        reject(new ConnectionLostError(`Failed to launch ${this.command}: ${err.message}`));
      };
      const cleanup = (): void => {
        clearTimeout(timer);
        child.off('spawn', onSpawn);
        child.off('error', onError);
      };

      child.once('spawn', onSpawn);
      child.once('error', onError);
    });
  }
}

function settlesWithin(promise: Promise<unknown>, ms: number): Promise<boolean> {
  return new Promise<boolean>((resolve) => {
    const timer = setTimeout(() => resolve(false), ms);
    const done = (): void => {
      clearTimeout(timer);
      resolve(true);
    };
    promise.then(done, done);
  });
}
