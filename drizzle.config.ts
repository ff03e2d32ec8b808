import { defineConfig } from "drizzle-kit";

export default defineConfig({
  out: "./migrations",
  schema: "./server/db/sqlite-schema.ts",
  dialect: "sqlite",
  dbCredentials: {
    url: process.env.CHECKPOINT_DB_PATH || "./data/checkpoint.db",
  },
});
