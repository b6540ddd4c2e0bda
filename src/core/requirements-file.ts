import { readFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';

export class RequirementsFileError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = 'RequirementsFileError';
  }
}

export interface RequirementsFileEntries {
  specifiers: string[];
  options: string[];
}

// Options whose operand is another file, relative to the file naming it.
const NESTED_FILE_OPTIONS = new Set(['-r', '--requirement', '-c', '--constraint']);

// pip has no command-line form of a per-requirement hash.
const PER_REQUIREMENT_ONLY = new Set(['--hash']);

const URL_SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/**
 * Split requirements-file text into specifiers and option tokens.
 *
 * Handles full-line and inline comments and backslash continuations; a
 * full-line comment always ends a continuation. Option lines
 * (`-c constraints.txt`, `--index-url URL`) are split on whitespace so they
 * can be passed on as separate arguments, and options trailing a specifier
 * (`foo==1.0 --config-settings k=v`) are split off it. With `baseDir`, the
 * operands of `-r` and `-c` are resolved against it.
 */
export function parseRequirementsFile(
  content: string,
  baseDir?: string,
): RequirementsFileEntries {
  const specifiers: string[] = [];
  const options: string[] = [];

  for (const raw of joinLines(content)) {
    const line = stripComment(raw).trim();
    if (line.length === 0) continue;

    if (line.startsWith('-')) {
      options.push(...rebaseOperands(line.split(/\s+/), baseDir));
      continue;
    }

    const trailing = /\s+--/.exec(line);
    if (!trailing) {
      specifiers.push(line);
      continue;
    }
    specifiers.push(line.slice(0, trailing.index));
    options.push(...perRequirementTokens(line.slice(trailing.index).trim().split(/\s+/)));
  }

  return { specifiers, options };
}

function isCommentLine(line: string): boolean {
  return line.trimStart().startsWith('#');
}

function joinLines(content: string): string[] {
  const logical: string[] = [];
  let pending: string | null = null;

  for (const physical of content.split(/\r?\n/)) {
    if (physical.endsWith('\\') && !isCommentLine(physical)) {
      pending = (pending ?? '') + physical.slice(0, -1);
      continue;
    }
    // leading space keeps a joined comment separable from the text before it
    const line = isCommentLine(physical) ? ` ${physical}` : physical;
    logical.push((pending ?? '') + line);
    pending = null;
  }
  if (pending !== null) logical.push(pending);
  return logical;
}

function stripComment(line: string): string {
  if (isCommentLine(line)) return '';
  const inline = /\s#/.exec(line);
  return inline ? line.slice(0, inline.index) : line;
}

function rebase(operand: string, baseDir: string): string {
  return URL_SCHEME.test(operand) ? operand : resolve(baseDir, operand);
}

function rebaseOperands(tokens: string[], baseDir: string | undefined): string[] {
  if (baseDir === undefined) return tokens;

  const out: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const eq = token.indexOf('=');
    if (token.startsWith('--') && eq > 0 && NESTED_FILE_OPTIONS.has(token.slice(0, eq))) {
      out.push(`${token.slice(0, eq)}=${rebase(token.slice(eq + 1), baseDir)}`);
    } else if (NESTED_FILE_OPTIONS.has(token) && i + 1 < tokens.length) {
      out.push(token, rebase(tokens[i + 1], baseDir));
      i++;
    } else {
      out.push(token);
    }
  }
  return out;
}

function perRequirementTokens(tokens: string[]): string[] {
  const out: string[] = [];
  for (let i = 0; i < tokens.length; i++) {
    const token = tokens[i];
    const name = token.includes('=') ? token.slice(0, token.indexOf('=')) : token;
    if (PER_REQUIREMENT_ONLY.has(name)) {
      // `--hash VALUE` carries its value in the next token
      if (name === token) i++;
      continue;
    }
    out.push(token);
  }
  return out;
}

export async function readRequirementsFile(
  path: string,
): Promise<RequirementsFileEntries> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (err) {
    throw new RequirementsFileError(`Cannot read ${path}`, err);
  }
  return parseRequirementsFile(content, dirname(path));
}
