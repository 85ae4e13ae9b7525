// src/routes/competitions.ts
import { withConnection } from "../db";
import { CompetitionsRepo } from "../modules/competitions/competitions.repo";
import { RegistrationsRepo } from "../modules/registrations/registrations.repo";
import { RegistrationsService } from "../modules/registrations/registrations.service";
import { competitionsRouter } from "../modules/competitions/competitions.routes";

const competitionsRepo = new CompetitionsRepo();
const service = new RegistrationsService(new RegistrationsRepo(competitionsRepo), competitionsRepo);

export default competitionsRouter({ service, withConnection });
