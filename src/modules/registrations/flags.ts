// src/modules/registrations/flags.ts
import type { Membership, Race, SpecialCategory } from "../../types/domain";

/** participant_id -> ids of the special categories that participant holds. */
export function indexMemberships(memberships: readonly Membership[]): Map<number, Set<number>> {
    const byParticipant = new Map<number, Set<number>>();
    for (const m of memberships) {
        let ids = byParticipant.get(m.participant_id);
        if (!ids) {
            ids = new Set<number>();
            byParticipant.set(m.participant_id, ids);
        }
        ids.add(m.special_category_id);
    }
    return byParticipant;
}

const NONE: ReadonlySet<number> = new Set<number>();

/**
 * One flag per category, in category order: `flags[i]` is true iff the
 * participant holds `categories[i]`. Always `categories.length` long.
 */
export function resolveFlags(
    categories: readonly SpecialCategory[],
    membershipIds: ReadonlySet<number> = NONE
): boolean[] {
    return categories.map((c) => membershipIds.has(c.id));
}

/**
 * Buckets categories by race_id, aligned with `races`. Keeps the loaded
 * order inside each bucket; categories of races not in the list are dropped.
 */
export function categoriesByRace(
    races: readonly Race[],
    categories: readonly SpecialCategory[]
): SpecialCategory[][] {
    const byRace = new Map<number, SpecialCategory[]>();
    for (const r of races) byRace.set(r.id, []);
    for (const c of categories) byRace.get(c.race_id)?.push(c);
    return races.map((r) => byRace.get(r.id) ?? []);
}
