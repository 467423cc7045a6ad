import { spawn } from 'node-pty';

import type { PtyFactory } from './types.js';

export const nodePtyFactory: PtyFactory = (file, args, options) =>
  spawn(file, [...args], {
    name: 'xterm-color',
    cols: options.cols ?? 200,
    rows: options.rows ?? 50,
    cwd: options.cwd,
    env: options.env,
  });

export function toPtyEnv(
  env: NodeJS.ProcessEnv,
  overrides: Record<string, string> = {},
): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (typeof value === 'string') {
      result[key] = value;
    }
  }
  return { ...result, ...overrides };
}
