/**
 * Lexical safety checks.
 *
 * These run on the raw statement text before any parsing. A match is an
 * immediate rejection, whatever the statement turns out to be.
 */

import type { GuardRule } from './types.js';

export interface LexicalViolation {
  rule: GuardRule;
  reason: string;
}

const FORBIDDEN_KEYWORDS: Array<{ keyword: string; pattern: RegExp }> = [
  { keyword: 'CREATE DATABASE', pattern: /\bCREATE\s+DATABASE\b/i },
  { keyword: 'DROP DATABASE', pattern: /\bDROP\s+DATABASE\b/i },
  ...['DELETE', 'DROP', 'TRUNCATE', 'ALTER', 'UPDATE', 'GRANT', 'REVOKE', 'EXECUTE', 'EXEC'].map(
    (keyword) => ({ keyword, pattern: new RegExp(`\\b${keyword}\\b`, 'i') }),
  ),
];

// Extended and system stored procedures: xp_cmdshell, sp_configure, ...
const PROCEDURE_PREFIX_RE = /\b(?:XP|SP)_\w*/i;

const COMMENT_MARKERS = ['--', '#', '/*'];

/**
 * Scan a statement for denylisted keywords, procedure prefixes and comment
 * markers. Returns the first violation, or null.
 */
export function findLexicalViolation(sql: string): LexicalViolation | null {
  for (const { keyword, pattern } of FORBIDDEN_KEYWORDS) {
    if (pattern.test(sql)) {
      return { rule: 'forbidden_keyword', reason: `Forbidden keyword: ${keyword}` };
    }
  }

  const procedure = sql.match(PROCEDURE_PREFIX_RE);
  if (procedure) {
    return {
      rule: 'privileged_procedure',
      reason: `Stored procedure calls are not allowed: ${procedure[0]}`,
    };
  }

  for (const marker of COMMENT_MARKERS) {
    if (sql.includes(marker)) {
      return { rule: 'comment_marker', reason: `SQL comments are not allowed: ${marker}` };
    }
  }

  return null;
}

/**
 * Count statements separated by `;` outside string literals and quoted
 * identifiers. Trailing semicolons do not start a new statement.
 */
export function countStatements(sql: string): number {
  let count = 0;
  let quote: string | null = null;
  let current = '';

  for (let i = 0; i < sql.length; i++) {
    const ch = sql[i];
    if (quote) {
      if (ch === '\\' && quote !== '`') {
        i++;
        continue;
      }
      if (ch === quote) {
        if (sql[i + 1] === quote) {
          i++;
        } else {
          quote = null;
        }
      }
      current += 'x';
      continue;
    }
    if (ch === "'" || ch === '"' || ch === '`') {
      quote = ch;
      current += 'x';
      continue;
    }
    if (ch === ';') {
      if (current.trim()) count++;
      current = '';
      continue;
    }
    current += ch;
  }

  if (current.trim()) count++;
  return count;
}

export function hasFileExport(sql: string): boolean {
  return /\bINTO\s+(?:OUTFILE|DUMPFILE)\b/i.test(sql);
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function findBlockedFunction(sql: string, blocked: string[]): string | null {
  for (const fn of blocked) {
    if (new RegExp(`\\b${escapeRegExp(fn)}\\s*\\(`, 'i').test(sql)) {
      return fn;
    }
  }
  return null;
}

/**
 * Find a reserved field mentioned anywhere in the statement as a whole
 * identifier (bare, backticked or quoted).
 */
export function findReservedField(sql: string, reserved: string[]): string | null {
  for (const field of reserved) {
    if (new RegExp(`(?<![\\w$])${escapeRegExp(field)}(?![\\w$])`, 'i').test(sql)) {
      return field;
    }
  }
  return null;
}
