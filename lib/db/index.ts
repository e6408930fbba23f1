/**
 * Drizzle ORM client singleton.
 *
 * @vercel/postgres reads POSTGRES_URL and opens the pool on the first query,
 * so importing this module needs no database.
 */

import { sql } from "@vercel/postgres";
import { drizzle } from "drizzle-orm/vercel-postgres";
import * as schema from "./schema";

export const db = drizzle({ client: sql, schema });
