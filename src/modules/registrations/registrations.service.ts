// src/modules/registrations/registrations.service.ts
import type {
    CompetitionList,
    Participant,
    ParticipantEntry,
    RaceGroupView,
    RegistrationReport,
} from "../../types/domain";
import type { SqlExecutor } from "../../data/sql";
import type { CompetitionsRepo } from "../competitions/competitions.repo";
import type { RelationLoader } from "./registrations.repo";
import { assertDistinctRaceNames, assertGrouped, groupByRace } from "./grouping";
import { categoriesByRace, indexMemberships, resolveFlags } from "./flags";
import { InvariantViolationError, NotFoundError } from "../../utils/errors";

export class RegistrationsService {
    constructor(
        private loader: RelationLoader,
        private competitions?: Pick<CompetitionsRepo, "listCompetitions">
    ) {}

    async listCompetitions(conn: SqlExecutor): Promise<CompetitionList> {
        if (!this.competitions) {
            throw new Error("RegistrationsService missing dependencies for listCompetitions()");
        }
        const competitions = await this.competitions.listCompetitions(conn);
        return { competitions };
    }

    /**
     * Participants of a competition grouped by race, each with one flag per
     * special category of their race.
     *
     * Five loads at most, whatever the number of races or participants:
     * competition, races, special categories, participants, memberships.
     */
    async registrationReport(conn: SqlExecutor, competitionId: number): Promise<RegistrationReport> {
        const competitionInfo = await this.loader.loadCompetition(conn, competitionId);
        if (!competitionInfo) {
            throw new NotFoundError(`No competition for id ${competitionId} found`);
        }

        const races = await this.loader.loadRaces(conn, competitionId);
        const specialCategories = await this.loader.loadSpecialCategories(conn, races);
        const participants = await this.loader.loadParticipants(conn, competitionId);
        const memberships = await this.loader.loadMemberships(conn, participants);

        assertDistinctRaceNames(races);
        const groups = groupByRace(races, participants);
        assertGrouped(groups, participants);

        const categories = categoriesByRace(races, specialCategories);
        const held = indexMemberships(memberships);

        const raceGroups: RaceGroupView[] = groups.map((g, i) => {
            const cats = categories[i];
            return {
                raceName: g.race.name,
                specialCategories: cats,
                participants: g.participants.map((p) => {
                    const flags = resolveFlags(cats, held.get(p.id));
                    if (flags.length !== cats.length) {
                        throw new InvariantViolationError(
                            `Flag vector of participant ${p.id} has ${flags.length} entries, race "${g.race.name}" has ${cats.length} special categories`
                        );
                    }
                    return toEntry(p, flags);
                }),
            };
        });

        return { competitionInfo, raceGroups };
    }
}

function toEntry(p: Participant, specialCategoryFlags: boolean[]): ParticipantEntry {
    return {
        first_name: p.first_name,
        last_name: p.last_name,
        club: p.club,
        birth_year: p.birth_year,
        start_time: p.start_time,
        class: p.class,
        specialCategoryFlags,
    };
}
