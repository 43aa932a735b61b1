/**
 * Crucible Specfile — Install Step Predicates
 *
 * The `%install` section of the recipe opens with the packaging tool's own
 * install invocation (`make DESTDIR=<buildroot> install`). The build driver
 * runs that step itself, with or without stripping, so the synthesized
 * install-section script must not run it a second time.
 *
 * Lines are tokenized with shell quoting rules and matched on tokens, so
 * `make DESTDIR=/out install`, `/usr/bin/make install DESTDIR=/out -j8` and
 * `V=1 make DESTDIR="/out" install` are all recognized while
 * `echo make DESTDIR=/out install` or `make -C doc install` are not.
 */

const ASSIGNMENT_PATTERN = /^[A-Za-z_][A-Za-z0-9_]*=/;

/**
 * Split a shell command line into words.
 *
 * Supports single quotes, double quotes and backslash escapes. Does not
 * expand variables or globs.
 */
export function tokenizeShellLine(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line.charAt(i);

    if (quote !== null) {
      if (ch === quote) {
        quote = null;
      } else if (ch === '\\' && quote === '"' && i + 1 < line.length) {
        current += line.charAt(++i);
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === '"' || ch === "'") {
      quote = ch;
      inToken = true;
    } else if (ch === '\\' && i + 1 < line.length) {
      current += line.charAt(++i);
      inToken = true;
    } else if (ch === ' ' || ch === '\t') {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += ch;
      inToken = true;
    }
  }

  if (inToken) tokens.push(current);
  return tokens;
}

function basename(word: string): string {
  const slash = word.lastIndexOf('/');
  return slash === -1 ? word : word.slice(slash + 1);
}

/**
 * True for the packaging tool's install invocation: a `make` command with a
 * `DESTDIR=` assignment and an `install` target.
 */
export function isPackageInstallStep(line: string): boolean {
  const tokens = tokenizeShellLine(line.trim());

  let i = 0;
  while (i < tokens.length && ASSIGNMENT_PATTERN.test(tokens[i] ?? '')) {
    i++;
  }
  const command = tokens[i];
  if (command === undefined || basename(command) !== 'make') {
    return false;
  }

  const args = tokens.slice(i + 1);
  return args.includes('install') && args.some((arg) => arg.startsWith('DESTDIR='));
}
