/**
 * Returns the first top-level `{...}` span in `input`, tracking string
 * literals so braces inside them do not count. `null` when no object opens or
 * the first one never closes.
 */
export const extractFirstJsonObject = (input: unknown): string | null => {
  if (typeof input !== 'string') {
    return null;
  }

  const startIndex = input.indexOf('{');
  if (startIndex === -1) {
    return null;
  }

  let inString = false;
  let escaped = false;
  let depth = 0;

  for (let index = startIndex; index < input.length; index += 1) {
    const char = input[index];

    if (inString) {
      if (escaped) {
        escaped = false;
        continue;
      }
      if (char === '\\') {
        escaped = true;
        continue;
      }
      if (char === '"') {
        inString = false;
      }
      continue;
    }

    if (char === '"') {
      inString = true;
      continue;
    }

    if (char === '{') {
      depth += 1;
      continue;
    }

    if (char === '}') {
      depth -= 1;
      if (depth === 0) {
        return input.slice(startIndex, index + 1);
      }
    }
  }

  return null;
};
