// src/modules/competitions/competitions.repo.ts
import type { Competition } from "../../types/domain";
import { qid, type SqlExecutor, type SqlRow } from "../../data/sql";
import { toDateOnly } from "../../utils/date";

const COMPETITION_COLUMNS = `
    ${qid("id")}       AS id,
    ${qid("name")}     AS name,
    ${qid("date")}     AS date,
    ${qid("location")} AS location`;

export class CompetitionsRepo {
    /** All competitions, oldest first; undated ones last. */
    async listCompetitions(conn: SqlExecutor): Promise<Competition[]> {
        const rows = await conn.select(
            `
      SELECT ${COMPETITION_COLUMNS}
      FROM ${qid("competitions")}
      ORDER BY ${qid("date")} IS NULL, ${qid("date")} ASC, ${qid("id")} ASC
      `
        );
        return rows.map(mapCompetition);
    }

    /** `null` when no row has this id. */
    async loadCompetition(conn: SqlExecutor, id: number): Promise<Competition | null> {
        const rows = await conn.select(
            `
      SELECT ${COMPETITION_COLUMNS}
      FROM ${qid("competitions")}
      WHERE ${qid("id")} = ?
      LIMIT 1
      `,
            [id]
        );
        return rows.length ? mapCompetition(rows[0]) : null;
    }
}

export function mapCompetition(r: SqlRow): Competition {
    return {
        id: Number(r.id),
        name: String(r.name ?? ""),
        date: toDateOnly(r.date),
        location: r.location != null ? String(r.location) : null,
    };
}
