// src/routes/v1.ts
import { Router } from "express";

import competitionsRoutes from "./competitions";

const v1 = Router();

v1.get("/health", (_req, res) => res.json({ ok: true }));

v1.use("/competitions", competitionsRoutes);

export default v1;
