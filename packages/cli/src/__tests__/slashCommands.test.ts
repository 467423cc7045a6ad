import { describe, expect, jest, test } from '@jest/globals';

import { createSlashCommandRouter, isDirectiveInput, parseSlashCommandInput } from '../slashCommands.js';

describe('parseSlashCommandInput', () => {
  test('splits the name from the rest', () => {
    expect(parseSlashCommandInput('  /Auto  on ')).toEqual({ name: 'auto', rest: 'on' });
  });

  test('keeps the spacing inside the rest', () => {
    expect(parseSlashCommandInput('/shell echo "a   b"')).toEqual({ name: 'shell', rest: 'echo "a   b"' });
  });

  test('returns null for plain text and a bare slash', () => {
    expect(parseSlashCommandInput('hello')).toBeNull();
    expect(parseSlashCommandInput('/')).toBeNull();
    expect(parseSlashCommandInput('  /   ')).toBeNull();
  });
});

describe('isDirectiveInput', () => {
  test('treats absolute paths as input, not directives', () => {
    expect(isDirectiveInput('/usr/bin/env')).toBe(false);
    expect(isDirectiveInput('/help')).toBe(true);
  });
});

describe('createSlashCommandRouter', () => {
  test('routes to the matching handler', async () => {
    const handler = jest.fn((rest: string) => `got ${rest}`);
    const route = createSlashCommandRouter(new Map([['remember', handler]]));

    await expect(route('/remember milk')).resolves.toEqual({ kind: 'handled', name: 'remember', result: 'got milk' });
    expect(handler).toHaveBeenCalledWith('milk');
  });

  test('distinguishes unknown directives from other input', async () => {
    const route = createSlashCommandRouter(new Map<string, () => string>());

    await expect(route('/nope')).resolves.toEqual({ kind: 'unknown', name: 'nope' });
    await expect(route('ls -la')).resolves.toEqual({ kind: 'not-command' });
    await expect(route('/bin/ls')).resolves.toEqual({ kind: 'not-command' });
  });
});
