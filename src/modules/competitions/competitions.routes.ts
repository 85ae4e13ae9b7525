// src/modules/competitions/competitions.routes.ts
import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import type { SqlExecutor } from "../../data/sql";
import type { RegistrationsService } from "../registrations/registrations.service";
import { parseId } from "../../utils/validators";

export interface CompetitionsRouteDeps {
    service: Pick<RegistrationsService, "listCompetitions" | "registrationReport">;
    withConnection: <T>(fn: (conn: SqlExecutor) => Promise<T>) => Promise<T>;
}

type Req = Pick<Request, "params">;
type Res = Pick<Response, "status" | "json">;

/** GET /api/v1/competitions → { competitions } */
export function listCompetitions(deps: CompetitionsRouteDeps) {
    return async (_req: Req, res: Res, next: NextFunction) => {
        try {
            const dto = await deps.withConnection((conn) => deps.service.listCompetitions(conn));
            res.json(dto);
        } catch (e) {
            next(e);
        }
    };
}

/**
 * GET /api/v1/competitions/:competition_id/registration_list
 *   → { competitionInfo, raceGroups: [{ raceName, specialCategories, participants }] }
 * Unknown ids reach the error handler as NotFoundError (404).
 */
export function registrationList(deps: CompetitionsRouteDeps) {
    return async (req: Req, res: Res, next: NextFunction) => {
        const competition_id = parseId(req.params.competition_id);
        if (competition_id === undefined) {
            res.status(400).json({ error: "competition_id is required" });
            return;
        }
        try {
            const report = await deps.withConnection((conn) =>
                deps.service.registrationReport(conn, competition_id)
            );
            res.json(report);
        } catch (e) {
            next(e);
        }
    };
}

export function competitionsRouter(deps: CompetitionsRouteDeps) {
    const router = Router();
    router.get("/", listCompetitions(deps));
    router.get("/:competition_id/registration_list", registrationList(deps));
    return router;
}
