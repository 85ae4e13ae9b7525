//src/server.ts
import { createApp } from "./index";
import { env } from "./config/env";
import { pool } from "./db";

const app = createApp();

const server = app.listen(env.port, () => {
  pool
    .query("SELECT 1")
    .then(() => console.log(`API listening on http://localhost:${env.port}`))
    .catch((err) => console.error("Database not reachable:", err));
});

process.on("SIGINT", () => {
  console.log("Shutting down...");
  pool
    .end()
    .catch((err) => console.error("Error closing pool:", err))
    .finally(() => server.close(() => process.exit(0)));
});
