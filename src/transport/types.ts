import type { EventEmitter } from 'node:events';
import type { Readable, Writable } from 'node:stream';
import type { SpawnOptions } from 'node:child_process';

export interface ExitInfo {
  code: number | null;
  signal: NodeJS.Signals | null;
}

/**
 * Line-oriented byte stream to one peer, with an explicit lifecycle.
 * Exactly one owner writes; frames never interleave.
 */
export interface Transport {
  readonly running: boolean;
  start(): Promise<void>;
  /** Resolves once `text` plus a newline has been handed to the stream. */
  sendLine(text: string): Promise<void>;
  /** Next complete line. ReadTimeoutError after `timeoutMs`, ConnectionLostError once the stream ended. */
  receiveLine(timeoutMs?: number, signal?: AbortSignal): Promise<string>;
  /** Graceful stop, escalating to a forced kill. The peer is not running once this resolves. */
  terminate(graceMs?: number): Promise<void>;
  onExit(listener: (info: ExitInfo) => void): () => void;
}

/** The slice of ChildProcess the stdio transport relies on; fakes implement just this. */
export interface ChildHandle extends EventEmitter {
  readonly stdin: Writable | null;
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly pid?: number | undefined;
  kill(signal?: NodeJS.Signals | number): boolean;
}

export type SpawnProcess = (command: string, args: string[], options: SpawnOptions) => ChildHandle;

export interface StdioTransportOptions {
  command: string;
  args?: string[];
  cwd?: string;
  env?: Record<string, string>;
  /** Default for `terminate()`. */
  terminateGraceMs?: number;
  /** How long `start()` waits for the OS to report the spawn. */
  startupTimeoutMs?: number;
  spawn?: SpawnProcess;
}
