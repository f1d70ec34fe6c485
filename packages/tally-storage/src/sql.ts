/**
 * Named parameter binding
 *
 * Statements are written once with :name placeholders and rewritten into
 * whatever each driver expects:
 * - dollar:   $1, $2 ... (pg); a repeated name reuses its index
 * - question: ? per occurrence (mysql2, better-sqlite3); values repeat
 * - named:    text unchanged, binds narrowed to the names referenced (oracledb)
 *
 * Quoted literals and ::casts are left untouched.
 */

import { SqlParams, SqlValue } from './interfaces';

export type PlaceholderStyle = 'dollar' | 'question' | 'named';

export interface BoundStatement {
  text: string;
  values: SqlValue[];
  named: Record<string, SqlValue>;
}

const NAME_START = /[A-Za-z_]/;
const NAME_PART = /[A-Za-z0-9_]/;

export function bindNamedParameters(
  sql: string,
  params: SqlParams = {},
  style: PlaceholderStyle
): BoundStatement {
  const values: SqlValue[] = [];
  const named: Record<string, SqlValue> = {};
  const positions = new Map<string, number>();

  let text = '';
  let inQuote = false;
  let i = 0;

  while (i < sql.length) {
    const ch = sql[i];

    if (ch === "'") {
      inQuote = !inQuote;
      text += ch;
      i++;
      continue;
    }

    const isPlaceholder =
      !inQuote &&
      ch === ':' &&
      sql[i - 1] !== ':' &&
      sql[i + 1] !== undefined &&
      NAME_START.test(sql[i + 1]);

    if (!isPlaceholder) {
      text += ch;
      i++;
      continue;
    }

    let end = i + 1;
    while (end < sql.length && NAME_PART.test(sql[end])) {
      end++;
    }
    const name = sql.slice(i + 1, end);
    const value = lookup(params, name);

    switch (style) {
      case 'dollar': {
        let position = positions.get(name);
        if (position === undefined) {
          values.push(value);
          position = values.length;
          positions.set(name, position);
        }
        text += `$${position}`;
        break;
      }
      case 'question':
        values.push(value);
        text += '?';
        break;
      case 'named':
        named[name] = value;
        text += `:${name}`;
        break;
    }

    i = end;
  }

  return { text, values, named };
}

function lookup(params: SqlParams, name: string): SqlValue {
  if (!Object.prototype.hasOwnProperty.call(params, name)) {
    throw new Error(`No value bound for parameter :${name}`);
  }
  return params[name] ?? null;
}
