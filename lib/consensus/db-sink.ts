/**
 * PersistenceSink backed by the Postgres repository.
 */

import { saveResearchSession } from "@/lib/db/queries";
import type { PersistenceSink } from "./persistence";

export function createDbPersistenceSink(): PersistenceSink {
  return {
    async saveSession(archive) {
      await saveResearchSession(archive);
    },
  };
}
