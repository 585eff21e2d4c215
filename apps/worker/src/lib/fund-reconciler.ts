export type FundStatusKind = "success" | "skipped" | "missing" | "critical";

export type FundStatus = {
  readonly fund: string;
  readonly referenceDate: string;
  readonly recordCount: number;
  readonly status: FundStatusKind;
  readonly note?: string;
};

export type SkipSignal = {
  readonly fund: string;
  readonly reason: string;
};

export type ReconcileInput = {
  expectedRoster: readonly string[];
  observedFunds: ReadonlyMap<string, number>;
  criticalFunds: readonly string[];
  skipSignals: readonly SkipSignal[];
  referenceDate: string;
};

export type ReconcileResult = {
  statuses: FundStatus[];
  unexpectedFunds: string[];
};

export const normalizeFundName = (value: string): string =>
  value.trim().replace(/\s+/g, " ").toLowerCase();

const sumByFund = (observed: ReadonlyMap<string, number>) => {
  const counts = new Map<string, { label: string; count: number }>();
  for (const [fund, count] of observed) {
    const key = normalizeFundName(fund);
    const current = counts.get(key);
    if (current) {
      current.count += count;
    } else {
      counts.set(key, { label: fund, count });
    }
  }
  return counts;
};

export const reconcile = ({
  expectedRoster,
  observedFunds,
  criticalFunds,
  skipSignals,
  referenceDate
}: ReconcileInput): ReconcileResult => {
  const observed = sumByFund(observedFunds);
  const critical = new Set(criticalFunds.map(normalizeFundName));
  const skipped = new Map<string, string>();
  for (const signal of skipSignals) {
    const key = normalizeFundName(signal.fund);
    if (!skipped.has(key)) {
      skipped.set(key, signal.reason);
    }
  }

  const statuses: FundStatus[] = [];
  const rosterKeys = new Set<string>();

  for (const fund of expectedRoster) {
    const key = normalizeFundName(fund);
    if (!key || rosterKeys.has(key)) {
      continue;
    }
    rosterKeys.add(key);

    const recordCount = observed.get(key)?.count ?? 0;
    if (recordCount > 0) {
      statuses.push({ fund, referenceDate, recordCount, status: "success" });
      continue;
    }

    const skipReason = skipped.get(key);
    if (skipReason !== undefined) {
      statuses.push({ fund, referenceDate, recordCount: 0, status: "skipped", note: skipReason });
      continue;
    }

    statuses.push(
      critical.has(key)
        ? {
            fund,
            referenceDate,
            recordCount: 0,
            status: "critical",
            note: "Critical fund returned no records."
          }
        : {
            fund,
            referenceDate,
            recordCount: 0,
            status: "missing",
            note: "No records and no skip signal."
          }
    );
  }

  const unexpectedFunds: string[] = [];
  for (const [key, entry] of observed) {
    if (entry.count > 0 && !rosterKeys.has(key)) {
      unexpectedFunds.push(entry.label);
    }
  }

  return { statuses, unexpectedFunds };
};
