/**
 * Fuzzy locate-and-replace for edit_file.
 *
 * Strategies run in a fixed order and the first one that produces a usable
 * candidate wins, even when a later strategy would also match. A candidate is
 * the literal text of the original content, so whatever normalization found it,
 * the replacement always substitutes bytes that really exist in the file.
 */

import { ToolError } from './tool-error.js';

export type ReplaceStrategy =
  | 'exact'
  | 'line-trimmed'
  | 'whitespace-normalized'
  | 'indentation-flexible';

export type MatchCandidate = {
  strategy: ReplaceStrategy;
  rank: number;
  literal: string;
  start: number;
  end: number;
};

export type ReplaceResult = {
  content: string;
  strategy: ReplaceStrategy | 'create';
  replacements: number;
};

type Finder = (content: string, find: string) => Array<{ start: number; end: number }>;

/** Character offset at which each line starts. */
function lineStarts(lines: string[]): number[] {
  const starts: number[] = [];
  let off = 0;
  for (const line of lines) {
    starts.push(off);
    off += line.length + 1;
  }
  return starts;
}

/** Span covering `count` lines starting at line `i`, without the final newline. */
function blockSpan(
  lines: string[],
  starts: number[],
  i: number,
  count: number
): { start: number; end: number } {
  const start = starts[i] ?? 0;
  const last = i + count - 1;
  const end = (starts[last] ?? 0) + (lines[last]?.length ?? 0);
  return { start, end };
}

const findExact: Finder = (content, find) => {
  const idx = content.indexOf(find);
  return idx === -1 ? [] : [{ start: idx, end: idx + find.length }];
};

const findLineTrimmed: Finder = (content, find) => {
  const lines = content.split('\n');
  const searchLines = find.split('\n');
  if (searchLines.length > 0 && searchLines[searchLines.length - 1] === '') searchLines.pop();
  if (searchLines.length === 0) return [];

  const starts = lineStarts(lines);
  const wanted = searchLines.map((l) => l.trim());
  for (let i = 0; i + wanted.length <= lines.length; i++) {
    let ok = true;
    for (let j = 0; j < wanted.length; j++) {
      if (lines[i + j].trim() !== wanted[j]) {
        ok = false;
        break;
      }
    }
    if (ok) return [blockSpan(lines, starts, i, wanted.length)];
  }
  return [];
};

function normalizeWhitespace(text: string): string {
  return text.trim().replace(/\s+/g, ' ');
}

const findWhitespaceNormalized: Finder = (content, find) => {
  const target = normalizeWhitespace(find);
  const lines = content.split('\n');
  const starts = lineStarts(lines);
  const out: Array<{ start: number; end: number }> = [];

  for (let i = 0; i < lines.length; i++) {
    if (normalizeWhitespace(lines[i]) === target) out.push(blockSpan(lines, starts, i, 1));
  }

  const findLines = find.split('\n');
  if (findLines.length > 1) {
    for (let i = 0; i + findLines.length <= lines.length; i++) {
      const block = lines.slice(i, i + findLines.length).join('\n');
      if (normalizeWhitespace(block) === target) {
        out.push(blockSpan(lines, starts, i, findLines.length));
      }
    }
  }
  return out;
};

function leadingIndent(line: string): number {
  const m = /^[ \t]*/.exec(line);
  return m ? m[0].length : 0;
}

/** Remove the smallest indentation shared by all non-blank lines. */
export function stripCommonIndent(text: string): string {
  const lines = text.split('\n');
  const nonBlank = lines.filter((l) => l.trim() !== '');
  if (nonBlank.length === 0) return text;
  const minIndent = Math.min(...nonBlank.map(leadingIndent));
  return lines.map((l) => (l.trim() === '' ? l : l.slice(minIndent))).join('\n');
}

const findIndentationFlexible: Finder = (content, find) => {
  const target = stripCommonIndent(find);
  const lines = content.split('\n');
  const starts = lineStarts(lines);
  const count = find.split('\n').length;
  const out: Array<{ start: number; end: number }> = [];
  for (let i = 0; i + count <= lines.length; i++) {
    const block = lines.slice(i, i + count).join('\n');
    if (stripCommonIndent(block) === target) out.push(blockSpan(lines, starts, i, count));
  }
  return out;
};

const STRATEGIES: Array<{ name: ReplaceStrategy; find: Finder }> = [
  { name: 'exact', find: findExact },
  { name: 'line-trimmed', find: findLineTrimmed },
  { name: 'whitespace-normalized', find: findWhitespaceNormalized },
  { name: 'indentation-flexible', find: findIndentationFlexible },
];

/** Every candidate of every strategy, in priority order, with the literal each one would replace. */
export function findCandidates(content: string, find: string): MatchCandidate[] {
  const out: MatchCandidate[] = [];
  STRATEGIES.forEach((s, rank) => {
    for (const span of s.find(content, find)) {
      const literal = content.slice(span.start, span.end);
      if (!literal) continue;
      out.push({ strategy: s.name, rank, literal, ...span });
    }
  });
  return out;
}

function isUnique(content: string, literal: string): boolean {
  return content.indexOf(literal) === content.lastIndexOf(literal);
}

function countOccurrences(content: string, literal: string): number {
  return content.split(literal).length - 1;
}

export function replaceInContent(
  content: string,
  oldText: string,
  newText: string,
  replaceAll = false
): ReplaceResult {
  if (oldText === newText) {
    throw new ToolError(
      'no_op',
      'oldString and newString must be different',
      false,
      'nothing to change; skip this edit'
    );
  }
  if (oldText === '') return { content: newText, strategy: 'create', replacements: 0 };

  // occurrences of the first candidate that matched more than once
  let ambiguousCount = 0;
  for (const [rank, s] of STRATEGIES.entries()) {
    for (const span of s.find(content, oldText)) {
      const literal = content.slice(span.start, span.end);
      if (!literal) continue;
      const candidate: MatchCandidate = { strategy: s.name, rank, literal, ...span };

      if (replaceAll) {
        return {
          content: content.split(candidate.literal).join(newText),
          strategy: candidate.strategy,
          replacements: countOccurrences(content, candidate.literal),
        };
      }
      if (!isUnique(content, candidate.literal)) {
        if (!ambiguousCount) ambiguousCount = Math.max(2, countOccurrences(content, candidate.literal));
        continue;
      }

      const at = content.indexOf(candidate.literal);
      return {
        content: content.slice(0, at) + newText + content.slice(at + candidate.literal.length),
        strategy: candidate.strategy,
        replacements: 1,
      };
    }
  }

  if (ambiguousCount) {
    throw new ToolError(
      'ambiguous',
      'oldString matches more than one location',
      false,
      'include more surrounding lines to make oldString unique, or set replaceAll=true',
      { occurrences: ambiguousCount }
    );
  }
  throw new ToolError(
    'no_match',
    'oldString not found in content',
    false,
    'read the file again and copy the exact text to replace'
  );
}
