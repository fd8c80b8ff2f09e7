/**
 * Split an argument line into argv entries.
 *
 * Whitespace separates arguments, double quotes group (and are removed),
 * and `\"` is a literal quote. Other backslashes are kept so Windows paths survive.
 */
export function tokenizeArgumentLine(line: string): string[] {
  const args: string[] = [];
  let current = '';
  let inToken = false;
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '\\' && line[i + 1] === '"') {
      current += '"';
      inToken = true;
      i++;
      continue;
    }

    if (char === '"') {
      quoted = !quoted;
      inToken = true;
      continue;
    }

    if (!quoted && /\s/.test(char)) {
      if (inToken) {
        args.push(current);
        current = '';
        inToken = false;
      }
      continue;
    }

    current += char;
    inToken = true;
  }

  if (inToken) {
    args.push(current);
  }

  return args;
}

/**
 * Quote a value for inclusion in an argument line
 */
export function quoteArgument(value: string): string {
  return `"${value.replace(/"/g, '\\"')}"`;
}
