import { runWithConcurrency } from "../utils/concurrency";
import type { SessionOutcome, SessionReport } from "./report";

/**
 * Run every session as an independent task and wait until all of them have
 * completed or failed. A failure is recorded in its outcome; it does not
 * cancel other sessions.
 */
export async function runSessions(
  keys: string[],
  worker: (key: string) => Promise<SessionReport>,
  concurrency: number
): Promise<SessionOutcome[]> {
  return runWithConcurrency(keys, concurrency, async (key): Promise<SessionOutcome> => {
    try {
      const report = await worker(key);
      return { session: key, status: "completed", report };
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : "Unknown session error";

      console.error("[Session Error]", {
        session: key,
        error: errorMessage,
        timestamp: new Date().toISOString(),
      });

      return { session: key, status: "failed", error: errorMessage };
    }
  });
}
