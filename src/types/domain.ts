// src/types/domain.ts
// === Core domain models (rows as loaded for one report) ===
export type ID = number;

export interface Competition {
    id: ID;
    name: string;
    date: string | null;       // "YYYY-MM-DD"
    location: string | null;
}

export interface Race {
    id: ID;
    competition_id: ID;
    name: string;
    from_age: number;          // MIN(categories.from_age) over the race's starts; ordering only
}

export interface SpecialCategory {
    id: ID;
    race_id: ID;
    short_name: string;
    description: string | null;
}

/** Flattened participant row; `race_name` is the grouping key, there is no race id. */
export interface Participant {
    id: ID;
    first_name: string;
    last_name: string;
    club: string | null;
    birth_year: number;
    start_time: string | null; // ISO-8601 UTC
    class: string;             // category label
    race_name: string;
}

export interface Membership {
    participant_id: ID;
    special_category_id: ID;
}

// === Report (handed to the renderer / serialized as JSON) ===
export type ParticipantEntry = Omit<Participant, "id" | "race_name"> & {
    /** Same length and order as the group's `specialCategories`. */
    specialCategoryFlags: boolean[];
};

export interface RaceGroupView {
    raceName: string;
    specialCategories: SpecialCategory[];
    participants: ParticipantEntry[];
}

export interface RegistrationReport {
    competitionInfo: Competition;
    raceGroups: RaceGroupView[];
}

export interface CompetitionList {
    competitions: Competition[];
}
