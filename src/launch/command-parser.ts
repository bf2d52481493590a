import { LaunchError } from '../errors/types.js';

/**
 * A launch command split into program, arguments and inline environment.
 */
export interface ParsedCommand {
  command: string;
  args: string[];
  /** Assignments from `export K=V &&` prefixes and leading `K=V` words */
  inlineEnv: Record<string, string>;
}

const ASSIGNMENT = /^([A-Za-z_][A-Za-z0-9_]*)=([\s\S]*)$/;

/**
 * Whether a target descriptor names a remote endpoint rather than a command.
 */
export function isUrlTarget(target: string): boolean {
  return /^https?:\/\//i.test(target.trim());
}

/**
 * Split a command line into words, honouring single quotes, double quotes
 * and backslash escapes. `&&` outside quotes separates segments.
 */
function splitSegments(input: string): string[][] {
  const segments: string[][] = [[]];
  let word = '';
  let inWord = false;
  let quote: '"' | "'" | null = null;

  const endWord = (): void => {
    if (inWord) {
      segments[segments.length - 1]?.push(word);
      word = '';
      inWord = false;
    }
  };

  for (let i = 0; i < input.length; i++) {
    const ch = input.charAt(i);

    if (quote === "'") {
      if (ch === "'") quote = null;
      else word += ch;
      continue;
    }

    if (quote === '"') {
      const next = input.charAt(i + 1);
      if (ch === '"') {
        quote = null;
      } else if (ch === '\\' && (next === '"' || next === '\\' || next === '$' || next === '`')) {
        word += next;
        i++;
      } else {
        word += ch;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inWord = true;
    } else if (ch === '\\' && i + 1 < input.length) {
      word += input.charAt(i + 1);
      inWord = true;
      i++;
    } else if (ch === '&' && input.charAt(i + 1) === '&') {
      endWord();
      segments.push([]);
      i++;
    } else if (/\s/.test(ch)) {
      endWord();
    } else {
      word += ch;
      inWord = true;
    }
  }

  if (quote) {
    throw new LaunchError(`Unterminated ${quote === '"' ? 'double' : 'single'} quote in launch command`);
  }
  endWord();
  return segments;
}

function readAssignment(word: string): [string, string] | null {
  const match = ASSIGNMENT.exec(word);
  return match?.[1] !== undefined && match[2] !== undefined ? [match[1], match[2]] : null;
}

/**
 * Parse a target such as `export API_KEY=x && npx -y some-server --stdio`.
 *
 * Every segment before the last may only hold `export K=V` or `K=V`
 * assignments; later assignments win. The last segment is the command,
 * optionally preceded by `K=V` words of its own.
 */
export function parseLaunchCommand(target: string): ParsedCommand {
  const segments = splitSegments(target.trim());
  const inlineEnv: Record<string, string> = {};
  const commandWords = segments[segments.length - 1] ?? [];

  for (const segment of segments.slice(0, -1)) {
    const words = segment[0] === 'export' ? segment.slice(1) : segment;
    for (const word of words) {
      const assignment = readAssignment(word);
      if (!assignment) {
        throw new LaunchError(`Only environment assignments may precede the command, got: ${word}`, {
          suggestions: ['Use the form: export KEY=VALUE && command args'],
        });
      }
      inlineEnv[assignment[0]] = assignment[1];
    }
  }

  let start = 0;
  for (; start < commandWords.length; start++) {
    const word = commandWords[start];
    const assignment = word === undefined ? null : readAssignment(word);
    if (!assignment) break;
    inlineEnv[assignment[0]] = assignment[1];
  }

  const [command, ...args] = commandWords.slice(start);
  if (!command) {
    throw new LaunchError('Launch command is empty', {
      suggestions: ['Pass a server URL or a command such as: npx -y @modelcontextprotocol/server-everything'],
    });
  }

  return { command, args, inlineEnv };
}
