/**
 * In-process stand-in for a pty-backed bash session.
 *
 * It understands just enough shell to exercise the session manager: the
 * setup line, the sentinel `printf` line, `cd`, `pwd`, `true`, `false`,
 * `echo`, quoted heredocs, and any custom handlers a test registers.
 */

import type { Disposable, PtyExitEvent, PtyFactory, PtyProcess, PtySpawnOptions } from '../types.js';

export type FakeCommandOutcome =
  | { output?: string; exitCode?: number }
  | 'hang'
  | 'exit';

export type FakeCommandHandler = (command: string, shell: FakeShellState) => FakeCommandOutcome | undefined;

export interface FakeShellState {
  cwd: string;
  lastExitCode: number;
}

export interface FakePtyOptions {
  directories?: Iterable<string>;
  handlers?: FakeCommandHandler[];
  echo?: boolean;
  chunkSize?: number;
  terminalNoise?: boolean;
}

const SENTINEL_LINE =
  /^__ptybridge_rc=\$\?; printf '%s%s %s %s\\n' '([^']*)' '([^']*)' "\$__ptybridge_rc" "\$PWD"$/;
const HEREDOC_START = /^(\S+) - <<'([A-Za-z0-9_]+)'$/;
const CD_COMMAND = /^cd(?: --)?\s+(?:'((?:[^']|'\\'')*)'|(\S+))$/;

let nextPid = 4000;

export class FakePty implements PtyProcess {
  readonly pid: number;

  readonly writes: string[] = [];

  readonly state: FakeShellState;

  killed = false;

  exited = false;

  private readonly directories: Set<string>;

  private readonly handlers: FakeCommandHandler[];

  private readonly echo: boolean;

  private readonly chunkSize: number;

  private readonly terminalNoise: boolean;

  private readonly dataListeners = new Set<(data: string) => void>();

  private readonly exitListeners = new Set<(event: PtyExitEvent) => void>();

  private pendingInput = '';

  private hung = false;

  private heredoc: { interpreter: string; delimiter: string; lines: string[] } | null = null;

  constructor(cwd: string, options: FakePtyOptions = {}) {
    this.pid = nextPid++;
    this.state = { cwd, lastExitCode: 0 };
    this.directories = new Set(options.directories ?? []);
    this.directories.add(cwd);
    this.handlers = options.handlers ?? [];
    this.echo = options.echo ?? false;
    this.chunkSize = options.chunkSize ?? 0;
    this.terminalNoise = options.terminalNoise ?? false;
  }

  write(data: string): void {
    if (this.exited) {
      throw new Error('write after exit');
    }
    this.writes.push(data);
    if (this.echo) {
      this.emitData(data.replace(/\n/g, '\r\n'));
    }
    this.pendingInput += data;

    let newlineIndex = this.pendingInput.indexOf('\n');
    while (newlineIndex !== -1) {
      const line = this.pendingInput.slice(0, newlineIndex);
      this.pendingInput = this.pendingInput.slice(newlineIndex + 1);
      this.processLine(line);
      newlineIndex = this.pendingInput.indexOf('\n');
    }
  }

  kill(_signal?: string): void {
    this.killed = true;
    this.crash(0, 1);
  }

  /** Simulate the shell process dying on its own. */
  crash(exitCode = 1, signal?: number): void {
    if (this.exited) {
      return;
    }
    this.exited = true;
    setImmediate(() => {
      for (const listener of this.exitListeners) {
        listener({ exitCode, signal });
      }
    });
  }

  onData(listener: (data: string) => void): Disposable {
    this.dataListeners.add(listener);
    return { dispose: () => this.dataListeners.delete(listener) };
  }

  onExit(listener: (event: PtyExitEvent) => void): Disposable {
    this.exitListeners.add(listener);
    return { dispose: () => this.exitListeners.delete(listener) };
  }

  get listenerCount(): number {
    return this.dataListeners.size + this.exitListeners.size;
  }

  private processLine(line: string): void {
    if (this.hung || this.exited) {
      return;
    }

    if (this.heredoc) {
      if (line === this.heredoc.delimiter) {
        const { interpreter, lines } = this.heredoc;
        this.heredoc = null;
        this.finish(this.runCommand(`${interpreter} <<script>>\n${lines.join('\n')}`));
        return;
      }
      this.heredoc.lines.push(line);
      return;
    }

    const sentinel = SENTINEL_LINE.exec(line);
    if (sentinel) {
      const [, head = '', tail = ''] = sentinel;
      const noise = this.terminalNoise ? '\u001b[?2004l' : '';
      this.emitData(`${noise}${head}${tail} ${this.state.lastExitCode} ${this.state.cwd}\r\n`);
      return;
    }

    if (line.startsWith('stty -echo')) {
      return;
    }

    const heredocStart = HEREDOC_START.exec(line);
    if (heredocStart) {
      const [, interpreter = '', delimiter = ''] = heredocStart;
      this.heredoc = { interpreter, delimiter, lines: [] };
      return;
    }

    this.finish(this.runCommand(line));
  }

  private finish(outcome: FakeCommandOutcome): void {
    if (outcome === 'hang') {
      this.hung = true;
      return;
    }
    if (outcome === 'exit') {
      this.crash(0);
      return;
    }
    if (outcome.output) {
      const text = outcome.output.endsWith('\n') ? outcome.output : `${outcome.output}\n`;
      this.emitData(text.replace(/\n/g, '\r\n'));
    }
    this.state.lastExitCode = outcome.exitCode ?? 0;
  }

  private runCommand(command: string): FakeCommandOutcome {
    for (const handler of this.handlers) {
      const outcome = handler(command, this.state);
      if (outcome !== undefined) {
        return outcome;
      }
    }

    const trimmed = command.trim();
    if (trimmed === ':' || trimmed === 'true' || trimmed === '') {
      return { exitCode: 0 };
    }
    if (trimmed === 'false') {
      return { exitCode: 1 };
    }
    if (trimmed === 'pwd') {
      return { output: this.state.cwd, exitCode: 0 };
    }
    if (trimmed === 'exit') {
      return 'exit';
    }
    if (trimmed.startsWith('echo ')) {
      return { output: trimmed.slice(5), exitCode: 0 };
    }

    const cd = CD_COMMAND.exec(trimmed);
    if (cd) {
      const target = cd[1] !== undefined ? cd[1].replace(/'\\''/g, "'") : (cd[2] ?? '');
      if (!this.directories.has(target)) {
        return { output: `bash: cd: ${target}: No such file or directory`, exitCode: 1 };
      }
      this.state.cwd = target;
      return { exitCode: 0 };
    }

    const [name = ''] = trimmed.split(/\s+/);
    return { output: `bash: ${name}: command not found`, exitCode: 127 };
  }

  private emitData(text: string): void {
    const chunks: string[] = [];
    if (this.chunkSize > 0) {
      for (let index = 0; index < text.length; index += this.chunkSize) {
        chunks.push(text.slice(index, index + this.chunkSize));
      }
    } else {
      chunks.push(text);
    }

    for (const chunk of chunks) {
      setImmediate(() => {
        for (const listener of this.dataListeners) {
          listener(chunk);
        }
      });
    }
  }
}

export interface FakePtyFactory {
  factory: PtyFactory;
  spawned: FakePty[];
  calls: Array<{ file: string; args: readonly string[]; options: PtySpawnOptions }>;
  readonly last: FakePty;
}

export function createFakePtyFactory(options: FakePtyOptions = {}): FakePtyFactory {
  const spawned: FakePty[] = [];
  const calls: FakePtyFactory['calls'] = [];

  return {
    factory: (file, args, spawnOptions) => {
      calls.push({ file, args, options: spawnOptions });
      const pty = new FakePty(spawnOptions.cwd, options);
      spawned.push(pty);
      return pty;
    },
    spawned,
    calls,
    get last(): FakePty {
      const pty = spawned[spawned.length - 1];
      if (!pty) {
        throw new Error('No fake pty has been spawned yet.');
      }
      return pty;
    },
  };
}
