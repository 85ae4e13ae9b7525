// src/data/sql.ts

/** A row as returned by the driver, before it is mapped onto a domain type. */
export type SqlRow = Record<string, unknown>;

/** The one thing loaders need from a connection. */
export interface SqlExecutor {
    select(sql: string, params?: unknown[]): Promise<SqlRow[]>;
}

// Backtick-quote an identifier (e.g., column or table)
export function qid(id: string) {
    // allow only alnum + underscore to prevent injection; then wrap in backticks
    if (!/^[A-Za-z0-9_]+$/.test(id)) throw new Error(`Invalid identifier: ${id}`);
    return `\`${id}\``;
}

// Build "?, ?, ?" placeholder list
export function placeholders(n: number) {
    return Array.from({ length: n }, () => "?").join(",");
}
