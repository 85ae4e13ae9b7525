// src/modules/registrations/registrations.repo.ts
import type { Competition, Membership, Participant, Race, SpecialCategory } from "../../types/domain";
import { placeholders, type SqlExecutor } from "../../data/sql";
import { columnToUtcZ } from "../../utils/date";
import { CompetitionsRepo } from "../competitions/competitions.repo";

/**
 * Everything the report needs, one query per call at most.
 * The connection is always passed in; loaders keep no state of their own.
 */
export interface RelationLoader {
    loadCompetition(conn: SqlExecutor, id: number): Promise<Competition | null>;
    loadRaces(conn: SqlExecutor, competitionId: number): Promise<Race[]>;
    loadSpecialCategories(conn: SqlExecutor, races: Race[]): Promise<SpecialCategory[]>;
    loadParticipants(conn: SqlExecutor, competitionId: number): Promise<Participant[]>;
    loadMemberships(conn: SqlExecutor, participants: Participant[]): Promise<Membership[]>;
}

// race_id -> youngest category age; shared by the race and participant queries
// so both sort on the same from_age.
const RACE_FROM_AGE = `
      SELECT s.race_id AS race_id, MIN(c.from_age) AS from_age
      FROM starts s
      JOIN categories c ON c.id = s.category_id
      GROUP BY s.race_id`;

export class RegistrationsRepo implements RelationLoader {
    constructor(private competitions = new CompetitionsRepo()) {}

    async loadCompetition(conn: SqlExecutor, id: number): Promise<Competition | null> {
        return this.competitions.loadCompetition(conn, id);
    }

    /** Races of a competition that have at least one start, by (from_age, name). */
    async loadRaces(conn: SqlExecutor, competitionId: number): Promise<Race[]> {
        const rows = await conn.select(
            `
      SELECT r.id AS id, r.competition_id AS competition_id, r.name AS name, ra.from_age AS from_age
      FROM races r
      JOIN (${RACE_FROM_AGE}
      ) ra ON ra.race_id = r.id
      WHERE r.competition_id = ?
      ORDER BY ra.from_age ASC, r.name ASC, r.id ASC
      `,
            [competitionId]
        );
        return rows.map((r) => ({
            id: Number(r.id),
            competition_id: Number(r.competition_id),
            name: String(r.name ?? ""),
            from_age: Number(r.from_age ?? 0),
        }));
    }

    /**
     * Special categories of the given races, one contiguous run per race
     * in the order of `races`, by id within a run.
     */
    async loadSpecialCategories(conn: SqlExecutor, races: Race[]): Promise<SpecialCategory[]> {
        if (!races.length) return [];
        const ids = races.map((r) => r.id);
        const rows = await conn.select(
            `
      SELECT sc.id AS id, sc.race_id AS race_id, sc.short_name AS short_name, sc.description AS description
      FROM special_categories sc
      WHERE sc.race_id IN (${placeholders(ids.length)})
      ORDER BY FIELD(sc.race_id, ${placeholders(ids.length)}), sc.id ASC
      `,
            [...ids, ...ids]
        );
        return rows.map((r) => ({
            id: Number(r.id),
            race_id: Number(r.race_id),
            short_name: String(r.short_name ?? ""),
            description: r.description != null ? String(r.description) : null,
        }));
    }

    /**
     * Flattened participant rows of a competition:
     * participants -> categories -> starts -> races.
     * Sorted by (race from_age, race name, race id, birth_year desc, first_name, last_name):
     * the same prefix as loadRaces, so each race's rows stay contiguous and in race
     * order even when the collation ranks two race names as equal.
     */
    async loadParticipants(conn: SqlExecutor, competitionId: number): Promise<Participant[]> {
        const rows = await conn.select(
            `
      SELECT
        p.id         AS id,
        p.first_name AS first_name,
        p.last_name  AS last_name,
        p.club       AS club,
        p.birth_year AS birth_year,
        s.time       AS start_time,
        c.label      AS class,
        r.name       AS race_name
      FROM participants p
      JOIN categories c ON c.id = p.category_id
      JOIN starts s     ON s.category_id = c.id
      JOIN races r      ON r.id = s.race_id
      JOIN (${RACE_FROM_AGE}
      ) ra ON ra.race_id = r.id
      WHERE r.competition_id = ?
      ORDER BY ra.from_age ASC, r.name ASC, r.id ASC, p.birth_year DESC, p.first_name ASC, p.last_name ASC
      `,
            [competitionId]
        );
        return rows.map((r) => ({
            id: Number(r.id),
            first_name: String(r.first_name ?? ""),
            last_name: String(r.last_name ?? ""),
            club: r.club != null ? String(r.club) : null,
            birth_year: Number(r.birth_year),
            start_time: columnToUtcZ(r.start_time),
            class: String(r.class ?? ""),
            race_name: String(r.race_name ?? ""),
        }));
    }

    /**
     * Special category memberships of the given participants. The join drops
     * memberships whose special category row no longer exists; those would
     * never match a flag column anyway.
     */
    async loadMemberships(conn: SqlExecutor, participants: Participant[]): Promise<Membership[]> {
        const ids = [...new Set(participants.map((p) => p.id))];
        if (!ids.length) return [];
        const rows = await conn.select(
            `
      SELECT m.participant_id AS participant_id, m.special_category_id AS special_category_id
      FROM special_category_per_participant m
      JOIN special_categories sc ON sc.id = m.special_category_id
      WHERE m.participant_id IN (${placeholders(ids.length)})
      ORDER BY m.participant_id ASC, m.special_category_id ASC
      `,
            ids
        );
        return rows.map((r) => ({
            participant_id: Number(r.participant_id),
            special_category_id: Number(r.special_category_id),
        }));
    }
}
