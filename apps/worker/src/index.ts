import crypto from "crypto";
import { createPgRowSink, createPool } from "@fundrun/db";
import { env } from "./lib/env";
import { createFileExtractSource } from "./lib/extract-file";
import { createDryRunSink, runExtraction, type RowSink } from "./lib/extract-pipeline";
import { createRunLogger, formatErrorName, logError } from "./lib/logger";
import { buildNotificationTrigger, createLogNotifier, dispatchNotification } from "./lib/notification";
import { resolveReferenceDates } from "./lib/reference-dates";
import { loadRosterRegistry } from "./lib/rosters";
import { loadSchemaRegistry } from "./lib/schema";

const boot = async (): Promise<number> => {
  const runId = crypto.randomUUID();
  const log = createRunLogger({ runId });
  const schemas = loadSchemaRegistry(env.CONFIG_DIR);
  const rosters = loadRosterRegistry(env.CONFIG_DIR);
  const referenceDates = resolveReferenceDates({
    date: env.RUN_DATE,
    range: env.RUN_DATE_RANGE
  });
  log.info("WORKER_READY", { referenceDate: referenceDates.join(",") });

  const pool = env.DATABASE_URL ? createPool(env.DATABASE_URL) : null;
  let sink: RowSink;
  if (pool) {
    sink = createPgRowSink(pool, { batchSize: env.INSERT_BATCH_SIZE });
  } else {
    log.warn("WORKER_DRY_RUN");
    sink = createDryRunSink();
  }

  const controller = new AbortController();
  const onSignal = () => controller.abort("Received termination signal");
  process.once("SIGINT", onSignal);
  process.once("SIGTERM", onSignal);

  try {
    const summary = await runExtraction({
      runId,
      extractTypes: env.RUN_EXTRACT_TYPES,
      referenceDates,
      deps: {
        schemas,
        rosters,
        source: createFileExtractSource(env.EXTRACT_DIR),
        sink
      },
      options: {
        retryAttempts: env.INSERT_RETRY_ATTEMPTS,
        retryDelayMs: env.INSERT_RETRY_DELAY_MS,
        signal: controller.signal
      }
    });

    const trigger = buildNotificationTrigger(summary, {
      recipients: env.NOTIFY_RECIPIENTS,
      missingFundsDisplayLimit: env.MISSING_FUNDS_DISPLAY_LIMIT
    });
    await dispatchNotification(createLogNotifier(), trigger);
    return summary.status === "success" ? 0 : 1;
  } finally {
    process.off("SIGINT", onSignal);
    process.off("SIGTERM", onSignal);
    if (pool) {
      await pool.end();
    }
  }
};

boot()
  .then((exitCode) => {
    process.exitCode = exitCode;
  })
  .catch((error: unknown) => {
    logError("WORKER_FAILED", { errorName: formatErrorName(error) });
    process.stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    process.exit(1);
  });
