/**
 * Shell line parsing
 *
 * Turns one line typed at the `minidrive` prompt into an action. Arguments
 * are split on whitespace; single or double quotes group words, and a
 * backslash escapes the next character outside single quotes.
 */
import type { DriveCommand } from '@minidrive/shared';

export type ShellAction =
  | { kind: 'command'; command: DriveCommand }
  | { kind: 'help' }
  | { kind: 'log' }
  | { kind: 'exit' }
  | { kind: 'empty' }
  | { kind: 'invalid'; message: string };

export interface ShellVerb {
  name: string;
  aliases: string[];
  usage: string;
  description: string;
}

export const SHELL_VERBS: readonly ShellVerb[] = [
  { name: 'ls', aliases: ['list'], usage: 'ls [query]', description: 'List the current folder, optionally filtered' },
  { name: 'cd', aliases: [], usage: 'cd <folder>', description: 'Open a folder (cd .. goes back)' },
  { name: 'up', aliases: ['back'], usage: 'up', description: 'Go back to the parent folder' },
  { name: 'pwd', aliases: [], usage: 'pwd', description: 'Show the current folder' },
  { name: 'mkdir', aliases: [], usage: 'mkdir <name>', description: 'Create a folder' },
  { name: 'upload', aliases: [], usage: 'upload <source> [name]', description: 'Copy a local file into the current folder' },
  { name: 'download', aliases: [], usage: 'download <name> <destination>', description: 'Copy a file out to a local path' },
  { name: 'rm', aliases: ['delete'], usage: 'rm <name>', description: 'Delete a file or folder' },
  { name: 'open', aliases: [], usage: 'open <name>', description: 'Preview a file' },
  { name: 'usage', aliases: [], usage: 'usage', description: 'Show storage usage' },
  { name: 'log', aliases: [], usage: 'log', description: 'Show the activity log' },
  { name: 'help', aliases: ['?'], usage: 'help', description: 'Show this help' },
  { name: 'exit', aliases: ['quit'], usage: 'exit', description: 'Leave the shell' },
];

export class ShellSyntaxError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ShellSyntaxError';
  }
}

/**
 * Split a line into arguments.
 *
 * @throws ShellSyntaxError on an unterminated quote or trailing backslash
 */
export function tokenize(line: string): string[] {
  const tokens: string[] = [];
  let current = '';
  let inToken = false;
  let quote: '"' | "'" | null = null;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (quote === "'") {
      if (char === "'") quote = null;
      else current += char;
      continue;
    }

    if (char === '\\') {
      const next = line[i + 1];
      if (next === undefined) throw new ShellSyntaxError('Line ends with a backslash');
      current += next;
      inToken = true;
      i++;
      continue;
    }

    if (quote === '"') {
      if (char === '"') quote = null;
      else current += char;
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
      inToken = true;
    } else if (/\s/.test(char)) {
      if (inToken) {
        tokens.push(current);
        current = '';
        inToken = false;
      }
    } else {
      current += char;
      inToken = true;
    }
  }

  if (quote !== null) throw new ShellSyntaxError(`Unterminated ${quote} quote`);
  if (inToken) tokens.push(current);
  return tokens;
}

function findVerb(word: string): ShellVerb | undefined {
  const lower = word.toLowerCase();
  return SHELL_VERBS.find((verb) => verb.name === lower || verb.aliases.includes(lower));
}

function arity(verb: ShellVerb, args: string[], min: number, max: number): ShellAction | null {
  if (args.length < min || args.length > max) {
    return { kind: 'invalid', message: `Usage: ${verb.usage}` };
  }
  return null;
}

export function parseShellLine(line: string): ShellAction {
  let tokens: string[];
  try {
    tokens = tokenize(line);
  } catch (error) {
    if (error instanceof ShellSyntaxError) return { kind: 'invalid', message: error.message };
    throw error;
  }

  const [word, ...args] = tokens;
  if (word === undefined) return { kind: 'empty' };

  const verb = findVerb(word);
  if (!verb) {
    return { kind: 'invalid', message: `Unknown command '${word}'. Type 'help' for a list of commands.` };
  }

  switch (verb.name) {
    case 'ls': {
      const invalid = arity(verb, args, 0, 1);
      if (invalid) return invalid;
      const [query] = args;
      return {
        kind: 'command',
        command: query === undefined ? { type: 'list' } : { type: 'filter', query },
      };
    }
    case 'cd': {
      const invalid = arity(verb, args, 1, 1);
      if (invalid) return invalid;
      const name = args[0] ?? '';
      return { kind: 'command', command: name === '..' ? { type: 'up' } : { type: 'enter', name } };
    }
    case 'up':
      return arity(verb, args, 0, 0) ?? { kind: 'command', command: { type: 'up' } };
    case 'pwd':
      return arity(verb, args, 0, 0) ?? { kind: 'command', command: { type: 'pwd' } };
    case 'mkdir':
      return arity(verb, args, 1, 1) ?? { kind: 'command', command: { type: 'mkdir', name: args[0] ?? '' } };
    case 'upload': {
      const invalid = arity(verb, args, 1, 2);
      if (invalid) return invalid;
      const [sourcePath = '', destName] = args;
      return {
        kind: 'command',
        command: destName === undefined ? { type: 'upload', sourcePath } : { type: 'upload', sourcePath, destName },
      };
    }
    case 'download': {
      const invalid = arity(verb, args, 2, 2);
      if (invalid) return invalid;
      const [name = '', destinationPath = ''] = args;
      return { kind: 'command', command: { type: 'download', name, destinationPath } };
    }
    case 'rm':
      return arity(verb, args, 1, 1) ?? { kind: 'command', command: { type: 'delete', name: args[0] ?? '' } };
    case 'open':
      return arity(verb, args, 1, 1) ?? { kind: 'command', command: { type: 'open', name: args[0] ?? '' } };
    case 'usage':
      return arity(verb, args, 0, 0) ?? { kind: 'command', command: { type: 'usage' } };
    case 'log':
      return arity(verb, args, 0, 0) ?? { kind: 'log' };
    case 'help':
      return { kind: 'help' };
    case 'exit':
      return { kind: 'exit' };
    default:
      return { kind: 'invalid', message: `Unknown command '${word}'` };
  }
}
