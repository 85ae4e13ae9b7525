// src/modules/registrations/test/fixtures.ts
import type { Competition, Membership, Participant, Race, SpecialCategory } from "../../../types/domain";
import type { SqlExecutor } from "../../../data/sql";
import type { RelationLoader } from "../registrations.repo";

export const competition: Competition = { id: 1, name: "Spring Run", date: "2024-05-01", location: "Harbour Park" };

export function race(id: number, name: string, from_age: number, competition_id = 1): Race {
    return { id, competition_id, name, from_age };
}

export function category(id: number, race_id: number, short_name: string): SpecialCategory {
    return { id, race_id, short_name, description: null };
}

export function participant(id: number, race_name: string, first_name: string, birth_year: number): Participant {
    return {
        id,
        first_name,
        last_name: "Runner",
        club: null,
        birth_year,
        start_time: "2024-05-01T09:00:00.000Z",
        class: "Open",
        race_name,
    };
}

export function member(participant_id: number, special_category_id: number): Membership {
    return { participant_id, special_category_id };
}

/** Two races, three special categories, five participants (3 + 2). */
export function spring() {
    const races = [race(1, "5km", 10), race(2, "10km", 18)];
    const categories = [category(11, 1, "local"), category(12, 1, "u14"), category(21, 2, "local")];
    const participants = [
        participant(101, "5km", "Anna", 2014),
        participant(102, "5km", "Ben", 2013),
        participant(103, "5km", "Carl", 2012),
        participant(201, "10km", "Dora", 2000),
        participant(202, "10km", "Emil", 1990),
    ];
    const memberships = [member(101, 11), member(101, 12), member(102, 12), member(201, 21)];
    return { races, categories, participants, memberships };
}

export interface LoaderData {
    competition: Competition | null;
    races: Race[];
    categories: SpecialCategory[];
    participants: Participant[];
    memberships: Membership[];
}

/** In-memory loader; `calls` lists every load in order, with the connection it got. */
export class FakeLoader implements RelationLoader {
    public calls: Array<{ op: string; conn: SqlExecutor }> = [];
    constructor(private data: LoaderData) {}

    async loadCompetition(conn: SqlExecutor, id: number) {
        this.calls.push({ op: "competition", conn });
        return this.data.competition && this.data.competition.id === id ? this.data.competition : null;
    }
    async loadRaces(conn: SqlExecutor, _competitionId: number) {
        this.calls.push({ op: "races", conn });
        return this.data.races;
    }
    async loadSpecialCategories(conn: SqlExecutor, _races: Race[]) {
        this.calls.push({ op: "specialCategories", conn });
        return this.data.categories;
    }
    async loadParticipants(conn: SqlExecutor, _competitionId: number) {
        this.calls.push({ op: "participants", conn });
        return this.data.participants;
    }
    async loadMemberships(conn: SqlExecutor, _participants: Participant[]) {
        this.calls.push({ op: "memberships", conn });
        return this.data.memberships;
    }
}

/** Connection stand-in for code that must never query directly. */
export const noQueries: SqlExecutor = {
    async select(sql: string) {
        throw new Error(`unexpected query: ${sql}`);
    },
};
