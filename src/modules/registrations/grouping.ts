// src/modules/registrations/grouping.ts
import type { Participant, Race } from "../../types/domain";
import { InvariantViolationError } from "../../utils/errors";

export interface RaceGroup {
    race: Race;
    participants: Participant[];
}

/**
 * Sort-merge grouping of participants into races.
 *
 * Both inputs must share their sort prefix (from_age, race name), so every
 * race's rows form one contiguous run in `participants`, in race order.
 * One forward cursor with a one-row lookahead: for each race, take rows
 * while `race_name` matches, then move on. Rows that are out of place are
 * never revisited and end up in no group; see `assertGrouped`.
 */
export function groupByRace(races: readonly Race[], participants: readonly Participant[]): RaceGroup[] {
    let cursor = 0;
    return races.map((race) => {
        const group: Participant[] = [];
        while (cursor < participants.length && participants[cursor].race_name === race.name) {
            group.push(participants[cursor]);
            cursor++;
        }
        return { race, participants: group };
    });
}

/**
 * Race names are the grouping key; two races with the same name would make
 * the first one take every row and leave the other empty.
 */
export function assertDistinctRaceNames(races: readonly Race[]): void {
    const seen = new Map<string, Race>();
    for (const race of races) {
        const other = seen.get(race.name);
        if (other) {
            throw new InvariantViolationError(
                `Races ${other.id} and ${race.id} share the name "${race.name}"; participants cannot be attributed`
            );
        }
        seen.set(race.name, race);
    }
}

/** Throws when the grouping pass left rows behind (contiguity was broken upstream). */
export function assertGrouped(groups: readonly RaceGroup[], participants: readonly Participant[]): void {
    const grouped = groups.reduce((n, g) => n + g.participants.length, 0);
    if (grouped === participants.length) return;

    const placed = new Set<Participant>();
    for (const g of groups) for (const p of g.participants) placed.add(p);
    const stray = participants.find((p) => !placed.has(p));
    const who = stray ? ` (first: participant ${stray.id} in race "${stray.race_name}")` : "";
    throw new InvariantViolationError(
        `Participant rows are not contiguous per race: grouped ${grouped} of ${participants.length}${who}`
    );
}
