import { formatErrorName, logError, logInfo, logWarn } from "./logger";
import { buildReportContext, buildSubject, type ReportContext } from "./report-context";
import type { RunSummary } from "./run-aggregator";

export type NotificationLevel = "success" | "warning" | "failure";

export type NotificationTrigger = {
  level: NotificationLevel;
  subject: string;
  recipients: string[];
  context: ReportContext;
};

export type RunNotifier = {
  notify: (trigger: NotificationTrigger) => Promise<void>;
};

export const notificationLevel = (summary: RunSummary): NotificationLevel => {
  if (summary.status === "failure") {
    return "failure";
  }
  const hasGaps =
    summary.missingFunds.length > 0 ||
    summary.skippedFunds.length > 0 ||
    summary.unexpectedFunds.length > 0 ||
    summary.rejections.length > 0;
  return hasGaps ? "warning" : "success";
};

export const buildNotificationTrigger = (
  summary: RunSummary,
  {
    recipients,
    missingFundsDisplayLimit
  }: { recipients: readonly string[]; missingFundsDisplayLimit?: number }
): NotificationTrigger => ({
  level: notificationLevel(summary),
  subject: buildSubject(summary),
  recipients: [...recipients],
  context: buildReportContext(summary, { missingFundsDisplayLimit })
});

/**
 * Writes the trigger to the structured log instead of delivering it. Used when no
 * mail transport is wired in.
 */
export const createLogNotifier = (): RunNotifier => ({
  notify: async (trigger) => {
    const log = trigger.level === "failure" ? logError : trigger.level === "warning" ? logWarn : logInfo;
    log("RUN_NOTIFICATION", {
      runId: trigger.context.runId,
      status: trigger.context.status,
      recordCount: trigger.context.totals.totalRecords,
      insertedCount: trigger.context.totals.inserted,
      rejectedCount: trigger.context.totals.rejected
    });
  }
});

/**
 * Delivery failures are logged and reported as false; they never change the run
 * outcome.
 */
export const dispatchNotification = async (
  notifier: RunNotifier,
  trigger: NotificationTrigger
): Promise<boolean> => {
  if (trigger.recipients.length === 0) {
    logWarn("RUN_NOTIFICATION_SKIPPED", { runId: trigger.context.runId });
    return false;
  }
  try {
    await notifier.notify(trigger);
    logInfo("RUN_NOTIFICATION_SENT", {
      runId: trigger.context.runId,
      status: trigger.level
    });
    return true;
  } catch (error) {
    logError("RUN_NOTIFICATION_FAILED", {
      runId: trigger.context.runId,
      errorName: formatErrorName(error)
    });
    return false;
  }
};
