import { LaunchDeniedError } from '../protocol/errors.js';

/** Shell metacharacters and path traversal are refused in arguments, allowlist or not. */
const UNSAFE_ARG_PATTERNS = ['..', '|', ';', '&', '`', '$'];

/**
 * CommandAllowlist — the set of executables a Transport may launch.
 *
 * Set at most once; afterwards immutable for the life of the process.
 * While never set, any command is allowed (argument checks still apply).
 * An explicitly empty list denies everything.
 */
export class CommandAllowlist {
  private commands: readonly string[] | null = null;

  set(commands: readonly string[]): void {
    if (this.commands !== null) {
      throw new LaunchDeniedError('Allowed commands are immutable once set');
    }
    this.commands = Object.freeze(commands.map(c => c.trim()).filter(c => c.length > 0));
  }

  get locked(): boolean {
    return this.commands !== null;
  }

  get entries(): readonly string[] {
    return this.commands ?? [];
  }

  isAllowed(command: string): boolean {
    if (/\s/.test(command)) return false;
    if (this.commands === null) return true;
    return this.commands.includes(command);
  }

  /** Throws LaunchDeniedError unless `command args` may be launched. */
  validate(command: string, args: readonly string[] = []): void {
    if (!this.isAllowed(command)) {
      const allowed = this.entries.map(c => `'${c}'`).join(', ') || '(none)';
      throw new LaunchDeniedError(`Command '${command}' not allowed. Allowed commands: ${allowed}`);
    }

    for (const arg of args) {
      const bad = UNSAFE_ARG_PATTERNS.find(p => arg.includes(p));
      if (bad) {
        throw new LaunchDeniedError(`Argument contains unsafe sequence '${bad}': ${arg}`);
      }
    }
  }
}

/** Process-wide allowlist, configured once at startup. */
export const commandAllowlist = new CommandAllowlist();

/** Parse the colon-separated form used by MCP_ALLOWED_COMMANDS. */
export function parseCommandList(value: string): string[] {
  return value.split(':').map(s => s.trim()).filter(s => s.length > 0);
}
