/**
 * Error types that are allowed to escape the bridge.
 *
 * Request-scoped failures (timeouts, safety rejections, malformed model output,
 * bad paths) are reported as values; only a session that cannot start and
 * invalid configuration propagate. A refused session lock reaches callers
 * wrapped in `SessionStartError`.
 */

export class SessionStartError extends Error {
  readonly shell: string;

  constructor(shell: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to start shell session (${shell}): ${detail}`);
    this.name = 'SessionStartError';
    this.shell = shell;
    this.cause = cause;
  }
}

export class ConfigurationError extends Error {
  readonly variable: string;

  constructor(variable: string, message: string) {
    super(`${variable} ${message}`);
    this.name = 'ConfigurationError';
    this.variable = variable;
  }
}

export interface SessionLockHolder {
  pid: number;
  workingTree: string;
  startedAt: string;
}

export class SessionLockedError extends Error {
  readonly holder: SessionLockHolder;

  constructor(holder: SessionLockHolder) {
    super(
      `another ptybridge process (pid ${holder.pid}) has held the session for ${holder.workingTree} ` +
        `since ${holder.startedAt}; run \`ptybridge --status\` to inspect it`,
    );
    this.name = 'SessionLockedError';
    this.holder = holder;
  }
}
