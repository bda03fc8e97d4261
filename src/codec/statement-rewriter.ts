import { serialize } from './semi-structured.js';

/**
 * Rewrites INSERT statements that bind values into semi-structured columns.
 *
 * The database parses semi-structured text itself (`json(?)` in SQLite,
 * `PARSE_JSON(?)` elsewhere), and most engines reject a function call inside
 * a VALUES list. The hook serializes the bound values, wraps their
 * placeholders in the parse function and turns
 *
 *     INSERT INTO t (a, b) VALUES (?, ?), (?, ?)
 *
 * into
 *
 *     INSERT INTO t (a, b) SELECT ?, json(?) UNION ALL SELECT ?, json(?)
 */

export type BindParameters = readonly unknown[] | Readonly<Record<string, unknown>>;

export interface BoundStatement {
    sql: string;
    params: BindParameters;
}

export type StatementHook = (statement: BoundStatement) => BoundStatement;

export interface SemiStructuredHookOptions {
    /** Semi-structured column names per table. */
    columns: Readonly<Record<string, readonly string[]>>;
    /** Parse function wrapped around each semi-structured placeholder. */
    parseFunction?: string;
}

interface ParsedInsert {
    head: string;
    table: string;
    columns: string[];
    rows: string[][];
    tail: string;
}

type Placeholder = { kind: 'named'; name: string } | { kind: 'positional'; index: number };

const INSERT_HEAD = /^\s*(INSERT(?:\s+OR\s+\w+)?\s+INTO\s+((?:"[^"]+"|`[^`]+`|\[[^\]]+\]|[\w.]+))\s*\(([^()]*)\))\s*VALUES\s*/i;
const PLACEHOLDER = /^(?:\?(\d*)|[@:$]([A-Za-z_]\w*))$/;

function unquote(identifier: string): string {
    const trimmed = identifier.trim();
    const first = trimmed[0];
    const last = trimmed[trimmed.length - 1];
    if ((first === '"' && last === '"') || (first === '`' && last === '`') || (first === '[' && last === ']')) {
        return trimmed.slice(1, -1);
    }
    return trimmed;
}

function tableName(identifier: string): string {
    const parts = identifier.split('.');
    return unquote(parts[parts.length - 1] ?? identifier).toLowerCase();
}

/**
 * Scan one parenthesized tuple starting at `start` (which must be `(`),
 * splitting it at top-level commas. Quotes and nested parentheses are
 * respected. Returns the items and the index just past the closing `)`.
 */
function scanTuple(sql: string, start: number): { items: string[]; end: number } | null {
    if (sql[start] !== '(') return null;

    const items: string[] = [];
    let depth = 0;
    let quote: string | null = null;
    let itemStart = start + 1;

    for (let i = start; i < sql.length; i++) {
        const ch = sql[i];
        if (quote) {
            if (ch === quote) {
                // Doubled quote is an escaped quote
                if (sql[i + 1] === quote) {
                    i++;
                } else {
                    quote = null;
                }
            }
            continue;
        }
        if (ch === "'" || ch === '"' || ch === '`') {
            quote = ch;
        } else if (ch === '(') {
            depth++;
        } else if (ch === ')') {
            depth--;
            if (depth === 0) {
                items.push(sql.slice(itemStart, i).trim());
                return { items, end: i + 1 };
            }
        } else if (ch === ',' && depth === 1) {
            items.push(sql.slice(itemStart, i).trim());
            itemStart = i + 1;
        }
    }

    return null;
}

function parseInsert(sql: string): ParsedInsert | null {
    const match = INSERT_HEAD.exec(sql);
    if (!match || match[1] === undefined || match[2] === undefined || match[3] === undefined) return null;

    const columns = match[3].split(',').map((c) => unquote(c).toLowerCase());
    const rows: string[][] = [];
    let cursor = match[0].length;

    for (;;) {
        const tuple = scanTuple(sql, cursor);
        if (!tuple || tuple.items.length !== columns.length) return null;
        rows.push(tuple.items);
        cursor = tuple.end;
        while (/\s/.test(sql[cursor] ?? '')) cursor++;
        if (sql[cursor] !== ',') break;
        cursor++;
        while (/\s/.test(sql[cursor] ?? '')) cursor++;
    }

    return {
        head: match[1],
        table: tableName(match[2]),
        columns,
        rows,
        tail: sql.slice(cursor).trim(),
    };
}

/**
 * Placeholders appearing in an expression, in order, outside string literals.
 */
function placeholdersIn(expression: string, nextPositional: { value: number }): Placeholder[] {
    const found: Placeholder[] = [];
    const pattern = /'(?:[^']|'')*'|"(?:[^"]|"")*"|\?(\d*)|[@:$]([A-Za-z_]\w*)/g;
    for (const match of expression.matchAll(pattern)) {
        const token = match[0];
        if (token.startsWith("'") || token.startsWith('"')) continue;
        if (match[2] !== undefined) {
            found.push({ kind: 'named', name: match[2] });
        } else if (match[1]) {
            found.push({ kind: 'positional', index: Number(match[1]) - 1 });
            nextPositional.value = Math.max(nextPositional.value, Number(match[1]));
        } else {
            found.push({ kind: 'positional', index: nextPositional.value });
            nextPositional.value++;
        }
    }
    return found;
}

function placeholderOf(expression: string, nextPositional: { value: number }): Placeholder | null {
    const found = placeholdersIn(expression, nextPositional);
    return PLACEHOLDER.test(expression) ? (found[0] ?? null) : null;
}

function isPositional(params: BindParameters): params is readonly unknown[] {
    return Array.isArray(params);
}

function wrappedArgument(expression: string, parseFunction: string): string | null {
    const prefix = `${parseFunction.toLowerCase()}(`;
    if (expression.toLowerCase().startsWith(prefix) && expression.endsWith(')')) {
        return expression.slice(prefix.length, -1).trim();
    }
    return null;
}

function serializeParams(params: BindParameters, targets: Placeholder[]): BindParameters {
    if (isPositional(params)) {
        const positional: unknown[] = [...params];
        const indexes = new Set(targets.flatMap((t) => (t.kind === 'positional' ? [t.index] : [])));
        for (const index of indexes) {
            if (index < positional.length) {
                positional[index] = serialize(positional[index]);
            }
        }
        return positional;
    }

    const named: Record<string, unknown> = { ...params };
    const names = new Set(targets.flatMap((t) => (t.kind === 'named' ? [t.name] : [])));
    for (const name of names) {
        if (name in named) {
            named[name] = serialize(named[name]);
        }
    }
    return named;
}

/**
 * Rewrite one statement. Statements that are not single- or multi-row
 * `INSERT ... VALUES` into a table with semi-structured columns are returned
 * unchanged.
 */
export function rewriteSemiStructuredInsert(statement: BoundStatement, options: SemiStructuredHookOptions): BoundStatement {
    const parseFunction = options.parseFunction ?? 'json';
    const parsed = parseInsert(statement.sql);
    if (!parsed) return statement;

    const semiColumns = new Set((options.columns[parsed.table] ?? []).map((c) => c.toLowerCase()));
    if (!parsed.columns.some((column) => semiColumns.has(column))) return statement;

    const targets: Placeholder[] = [];
    const nextPositional = { value: 0 };

    const selects = parsed.rows.map((row) => {
        const expressions = row.map((expression, columnIndex) => {
            const column = parsed.columns[columnIndex] ?? '';
            if (!semiColumns.has(column)) {
                placeholdersIn(expression, nextPositional);
                return expression;
            }

            const inner = wrappedArgument(expression, parseFunction);
            const placeholder = placeholderOf(inner ?? expression, nextPositional);
            if (!placeholder) {
                // Literal or computed value: leave it to the database
                return expression;
            }
            targets.push(placeholder);
            return inner === null ? `${parseFunction}(${expression})` : expression;
        });
        return `SELECT ${expressions.join(', ')}`;
    });

    const tail = /^ON\s+CONFLICT\b/i.test(parsed.tail) ? `WHERE true ${parsed.tail}` : parsed.tail;
    const sql = [parsed.head, selects.join(' UNION ALL '), tail].filter((part) => part.length > 0).join(' ');

    return { sql, params: serializeParams(statement.params, targets) };
}

/**
 * Statement hook for the relational store's write path.
 */
export function createSemiStructuredHook(options: SemiStructuredHookOptions): StatementHook {
    return (statement) => rewriteSemiStructuredInsert(statement, options);
}
