/**
 * Batch input discovery.
 *
 * Patterns use `/` as separator and support `*`, `?`, `**` (whole
 * segments only) and bracket classes (`[abc]`, `[a-z]`, `[!abc]`).
 * Matching walks the pattern's literal base directory.
 */

import { readdir } from 'node:fs/promises';
import { join, posix, sep } from 'node:path';
import { ErrorCode, InputError } from '@schemasmith/core';
import { isNotFound } from './config.js';

const WILDCARD = /[*?[]/;

export interface CompiledGlob {
  /** Normalized pattern. */
  readonly pattern: string;
  /** Directory the walk starts from ('.' when the pattern has no literal prefix). */
  readonly base: string;
  /** Segments below `base`; Infinity when the pattern contains `**`. */
  readonly depth: number;
  readonly regex: RegExp;
}

export function compileGlob(raw: string): CompiledGlob {
  if (raw.trim() === '') {
    throw invalidPattern(raw, 'pattern is empty');
  }

  const pattern = posix.normalize(raw.split(sep).join('/'));
  const segments = pattern.split('/');
  const literal: string[] = [];
  for (const segment of segments) {
    if (WILDCARD.test(segment)) break;
    literal.push(segment);
  }

  // Leave at least one segment to match against.
  if (literal.length === segments.length) literal.pop();

  const rest = segments.slice(literal.length);
  const base =
    literal.length === 0
      ? '.'
      : literal.length === 1 && literal[0] === ''
        ? '/'
        : literal.join('/');

  return {
    pattern,
    base,
    depth: rest.includes('**') ? Infinity : rest.length,
    regex: globToRegExp(pattern),
  };
}

export function globToRegExp(pattern: string): RegExp {
  let source = '';
  let i = 0;

  while (i < pattern.length) {
    const ch = pattern.charAt(i);

    if (ch === '*') {
      if (pattern.charAt(i + 1) !== '*') {
        source += '[^/]*';
        i += 1;
        continue;
      }
      const atStart = i === 0 || pattern.charAt(i - 1) === '/';
      const next = pattern.charAt(i + 2);
      if (!atStart || (next !== '' && next !== '/')) {
        throw invalidPattern(pattern, '"**" must form a whole path segment');
      }
      if (next === '/') {
        source += '(?:[^/]*/)*';
        i += 3;
      } else {
        source += '.*';
        i += 2;
      }
      continue;
    }

    if (ch === '?') {
      source += '[^/]';
      i += 1;
      continue;
    }

    if (ch === '[') {
      const { expression, end } = readClass(pattern, i);
      source += expression;
      i = end;
      continue;
    }

    source += escapeRegExp(ch);
    i += 1;
  }

  return new RegExp(`^${source}$`);
}

function readClass(
  pattern: string,
  start: number
): { expression: string; end: number } {
  let i = start + 1;
  let negated = false;
  if (pattern.charAt(i) === '!') {
    negated = true;
    i += 1;
  }

  let body = '';
  let first = true;
  while (i < pattern.length) {
    const ch = pattern.charAt(i);
    // A leading ']' is a literal member
    if (ch === ']' && !first) {
      if (body === '') {
        throw invalidPattern(pattern, 'empty character class');
      }
      return {
        expression: `[${negated ? '^' : ''}${body}]`,
        end: i + 1,
      };
    }
    if (ch === '/') {
      throw invalidPattern(pattern, 'character class may not contain "/"');
    }
    body += ch === '-' && !first && pattern.charAt(i + 1) !== ']' ? '-' : escapeClassChar(ch);
    first = false;
    i += 1;
  }
  throw invalidPattern(pattern, 'unclosed character class');
}

function escapeRegExp(ch: string): string {
  return /[.*+?^${}()|[\]\\]/.test(ch) ? `\\${ch}` : ch;
}

function escapeClassChar(ch: string): string {
  return /[\\\]^-]/.test(ch) ? `\\${ch}` : ch;
}

function invalidPattern(pattern: string, reason: string): InputError {
  return new InputError({
    message: `Invalid glob pattern "${pattern}": ${reason}`,
    errorCode: ErrorCode.INVALID_GLOB_PATTERN,
    context: { value: pattern },
  });
}

/**
 * Expand a pattern to the sorted list of matching regular files.
 * A base directory that does not exist yields no matches.
 */
export async function expandGlob(raw: string): Promise<string[]> {
  const glob = compileGlob(raw);
  const matches: string[] = [];

  await walkDir(glob.base, glob.depth, async (filePath) => {
    const candidate = filePath.split(sep).join('/');
    if (glob.regex.test(candidate)) {
      matches.push(filePath);
    }
  });

  return matches.sort();
}

async function walkDir(
  dir: string,
  depth: number,
  onFile: (filePath: string) => Promise<void>
): Promise<void> {
  if (depth <= 0) return;

  const dirents = await readdir(dir, { withFileTypes: true }).catch(
    (error: unknown) => {
      if (isNotFound(error)) return [];
      throw error;
    }
  );

  for (const dirent of dirents) {
    const fullPath = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      await walkDir(fullPath, depth - 1, onFile);
    } else if (dirent.isFile()) {
      await onFile(fullPath);
    }
  }
}
