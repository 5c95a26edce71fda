/**
 * ClinicDesk - Drizzle ORM Configuration
 *
 * Used by `drizzle-kit` for studio and introspection. The schema itself is
 * applied from src/db/schema.sql when the connection opens.
 * Run: npm run db:studio
 */

import { defineConfig } from "drizzle-kit";

export default defineConfig({
  schema: "./src/db/schema/index.ts",
  out: "./src/db/migrations",
  dialect: "sqlite",
  dbCredentials: {
    url: process.env.CLINICDESK_DB_PATH ?? "dental_clinic.db",
  },
});
