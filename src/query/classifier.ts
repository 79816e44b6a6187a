/**
 * SQL Statement Classifier
 *
 * Attributes a raw SQL statement to one (operation, table) pair using
 * lexical patterns rather than a grammar. Handles:
 * - Leading line comments and nested block comments
 * - Backtick, double and single quoted identifiers
 * - Schema-qualified names (schema.table)
 * - SELECT from a parenthesised sub-select
 */

import { Classification, ClassifierOptions, TableOperation } from '../types.js';

/** One identifier part, quoted or bare (bare parts stop at a dot) */
const IDENT_PART = '(?:`[^`]+`|"[^"]+"|\'[^\']+\'|[^\\s`"\'(),;.]+)';

/** Dot-separated identifier, e.g. `other_db`.file */
const TARGET = `(${IDENT_PART}(?:\\.${IDENT_PART})*)`;

const SELECT_PATTERN = new RegExp(`^SELECT\\b[\\s\\S]*?\\bFROM(?:\\s*(\\()|\\s+${TARGET})`, 'i');
const INSERT_PATTERN = new RegExp(`^INSERT\\s+INTO\\s+${TARGET}`, 'i');
const UPDATE_PATTERN = new RegExp(`^UPDATE\\s+${TARGET}\\s+SET\\b`, 'i');
const DELETE_PATTERN = new RegExp(`^DELETE\\s+FROM\\s+${TARGET}`, 'i');

const IDENT_PART_GLOBAL = new RegExp(IDENT_PART, 'g');

const QUOTE_CHARS = new Set(['`', '"', "'"]);

const UNCLASSIFIED: Classification = { kind: 'unclassified' };

const SUBSELECT: Classification = { kind: 'subselect', operation: 'select', table: 'select' };

/**
 * Strips a leading line comment from SQL and returns the remaining string.
 * Returns null if no line comment is present.
 */
function stripLineComment(sql: string): string | null {
  if (!sql.startsWith('--')) {
    return null;
  }
  const newlineIndex = sql.indexOf('\n');
  if (newlineIndex === -1) {
    return '';
  }
  return sql.substring(newlineIndex + 1).trim();
}

/**
 * Finds the end position of a nested block comment starting at position 0.
 * Returns the position after the closing comment, or -1 if unclosed.
 */
function findBlockCommentEnd(sql: string): number {
  let depth = 1;
  let i = 2;
  while (i < sql.length && depth > 0) {
    if (sql[i] === '/' && sql[i + 1] === '*') {
      depth++;
      i += 2;
    } else if (sql[i] === '*' && sql[i + 1] === '/') {
      depth--;
      i += 2;
    } else {
      i++;
    }
  }
  return depth > 0 ? -1 : i;
}

/**
 * Strips leading line comments and (nested) block comments from SQL.
 * Returns an empty string if the entire content is comments.
 *
 * @param sql - The SQL string to process
 * @returns The SQL with leading comments and surrounding whitespace removed
 */
export function stripLeadingComments(sql: string): string {
  let result = sql.trim();

  while (result.length > 0) {
    const afterLineComment = stripLineComment(result);
    if (afterLineComment !== null) {
      if (afterLineComment === '') return '';
      result = afterLineComment;
      continue;
    }

    if (result.startsWith('/*')) {
      const endPos = findBlockCommentEnd(result);
      if (endPos === -1) {
        return '';
      }
      result = result.substring(endPos).trim();
      continue;
    }

    break;
  }

  return result;
}

/**
 * Removes one layer of wrapping quotes from each part of a table target,
 * keeping the dots between parts.
 *
 * @example
 * normalizeTableTarget('`file`')             // 'file'
 * normalizeTableTarget('other_db.file')      // 'other_db.file'
 * normalizeTableTarget('"public"."Users"')   // 'public.Users'
 */
export function normalizeTableTarget(target: string): string {
  const parts = target.match(IDENT_PART_GLOBAL) ?? [];
  return parts
    .map((part) => {
      const first = part[0];
      if (part.length >= 2 && QUOTE_CHARS.has(first) && part[part.length - 1] === first) {
        return part.slice(1, -1);
      }
      return part;
    })
    .join('.');
}

/**
 * Finds the table a SELECT reads from. Returns "(" when the first FROM is
 * followed by a sub-select, null when there is no FROM target at all.
 */
function findSelectTarget(sql: string, reportSubselectTables: boolean): string | null {
  const match = SELECT_PATTERN.exec(sql);
  if (!match) {
    return null;
  }
  if (match[2] !== undefined) {
    return normalizeTableTarget(match[2]);
  }
  if (!reportSubselectTables) {
    return '(';
  }

  const body = sql.slice(match.index + match[0].length).replace(/^[\s(]+/, '');
  return findSelectTarget(body, true) ?? '(';
}

function classified(operation: TableOperation, target: string): Classification {
  return { kind: 'classified', operation, table: normalizeTableTarget(target) };
}

/**
 * Classify a SQL statement by operation and table.
 *
 * Patterns are tried in order and the first match wins:
 * `SELECT ... FROM t`, `INSERT INTO t`, `UPDATE t SET`, `DELETE FROM t`.
 * Anything else is unclassified. Never throws.
 *
 * @param sql - The raw statement
 * @param options - Classifier options
 * @returns The classification of the statement
 *
 * @example
 * classifySql('Select * from file')
 * // { kind: 'classified', operation: 'select', table: 'file' }
 * classifySql('SELECT abc, def from (select * from file)')
 * // { kind: 'subselect', operation: 'select', table: 'select' }
 */
export function classifySql(sql: string, options: ClassifierOptions = {}): Classification {
  const statement = stripLeadingComments(sql);
  if (statement === '') {
    return UNCLASSIFIED;
  }

  const selectTarget = findSelectTarget(statement, options.reportSubselectTables === true);
  if (selectTarget === '(') {
    return SUBSELECT;
  }
  if (selectTarget !== null) {
    return { kind: 'classified', operation: 'select', table: selectTarget };
  }

  const insertMatch = INSERT_PATTERN.exec(statement);
  if (insertMatch) {
    return classified('insert', insertMatch[1]);
  }

  const updateMatch = UPDATE_PATTERN.exec(statement);
  if (updateMatch) {
    return classified('update', updateMatch[1]);
  }

  const deleteMatch = DELETE_PATTERN.exec(statement);
  if (deleteMatch) {
    return classified('delete', deleteMatch[1]);
  }

  return UNCLASSIFIED;
}
