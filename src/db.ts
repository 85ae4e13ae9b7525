// src/db.ts
import mysql from "mysql2/promise";
import type { RowDataPacket } from "mysql2/promise";
import { env } from "./config/env";
import type { SqlExecutor } from "./data/sql";

export const pool = mysql.createPool({
  host: env.db.host,
  port: env.db.port,
  user: env.db.user,
  password: env.db.password,
  database: env.db.name,
  waitForConnections: true,
  connectionLimit: env.db.connLimit,
  queueLimit: 0,
  // DATE columns stay "YYYY-MM-DD"; DATETIME still maps to Date
  dateStrings: ["DATE"],
});

/**
 * Runs `fn` with one pooled connection and releases it afterwards,
 * whether `fn` resolves or rejects. Every loader call made inside `fn`
 * gets the same executor passed in explicitly.
 */
export async function withConnection<T>(fn: (conn: SqlExecutor) => Promise<T>): Promise<T> {
  const conn = await pool.getConnection();
  try {
    return await fn({
      async select(sql, params = []) {
        const [rows] = await conn.query<RowDataPacket[]>(sql, params);
        return rows;
      },
    });
  } finally {
    conn.release();
  }
}
