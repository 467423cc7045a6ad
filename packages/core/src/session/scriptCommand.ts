import { randomBytes } from 'node:crypto';

import { DEFAULT_SCRIPT_INTERPRETER } from '../constants.js';

/**
 * Wrap a script snippet in a quoted heredoc fed to the interpreter's stdin, so
 * the shell performs no expansion on the snippet itself.
 */
export function buildScriptCommand(
  code: string,
  interpreter: string = DEFAULT_SCRIPT_INTERPRETER,
  delimiter: string = `PTYBRIDGE_SCRIPT_${randomBytes(6).toString('hex').toUpperCase()}`,
): string {
  const body = code.endsWith('\n') ? code : `${code}\n`;
  return `${interpreter} - <<'${delimiter}'\n${body}${delimiter}`;
}
