export type ParsedSlashCommand = {
  name: string;
  rest: string;
};

export type SlashCommandHandler<T> = (rest: string) => Promise<T> | T;

export type SlashCommandRoute<T> =
  | { kind: 'not-command' }
  | { kind: 'unknown'; name: string }
  | { kind: 'handled'; name: string; result: T };

export type SlashCommandRouter<T> = (submission: string) => Promise<SlashCommandRoute<T>>;

export function parseSlashCommandInput(value: string): ParsedSlashCommand | null {
  if (typeof value !== 'string') {
    return null;
  }

  const trimmed = value.trim();
  if (!trimmed.startsWith('/')) {
    return null;
  }

  const withoutPrefix = trimmed.slice(1).trim();
  if (!withoutPrefix) {
    return null;
  }

  // The remainder keeps its inner spacing; `/shell` passes it to the shell verbatim.
  const match = /^(\S+)(?:\s+([\s\S]*))?$/u.exec(withoutPrefix);
  if (!match || !match[1]) {
    return null;
  }

  return {
    name: match[1].toLowerCase(),
    rest: (match[2] ?? '').trim(),
  };
}

/**
 * Absolute paths such as `/usr/bin/env` look like slash commands; only names
 * without another slash are treated as directives.
 */
export function isDirectiveInput(value: string): boolean {
  const parsed = parseSlashCommandInput(value);
  return parsed !== null && !parsed.name.includes('/');
}

export function createSlashCommandRouter<T>(handlers: Map<string, SlashCommandHandler<T>>): SlashCommandRouter<T> {
  return async (submission) => {
    if (!isDirectiveInput(submission)) {
      return { kind: 'not-command' };
    }
    const parsed = parseSlashCommandInput(submission);
    if (!parsed) {
      return { kind: 'not-command' };
    }

    const handler = handlers.get(parsed.name);
    if (!handler) {
      return { kind: 'unknown', name: parsed.name };
    }

    const result = await handler(parsed.rest);
    return { kind: 'handled', name: parsed.name, result };
  };
}
