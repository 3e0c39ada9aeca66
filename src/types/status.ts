/**
 * Monitoring status reported to engines such as Nagios, Naemon or Icinga.
 *
 * Statuses are ordered from least to most severe; a check's overall
 * status is the worst of its parts.
 */

export type MonitoringStatus = "OK" | "Warning" | "Critical" | "Unknown";

export interface StatusDescriptor {
  readonly id: MonitoringStatus;
  /** Process exit code a check plugin reports for this status. */
  readonly exitCode: number;
  readonly description: string;
}

export const MONITORING_STATUSES = {
  OK: {
    id: "OK",
    exitCode: 0,
    description: "All values are within their expected ranges",
  },
  Warning: {
    id: "Warning",
    exitCode: 1,
    description: "At least one value lies in its warning range",
  },
  Critical: {
    id: "Critical",
    exitCode: 2,
    description: "At least one value lies in its critical range",
  },
  Unknown: {
    id: "Unknown",
    exitCode: 3,
    description: "The check could not determine a result",
  },
} as const satisfies Record<MonitoringStatus, StatusDescriptor>;

export function exitCode(status: MonitoringStatus): number {
  return MONITORING_STATUSES[status].exitCode;
}

/**
 * Orders two statuses by severity. Negative when `a` is less severe.
 */
export function compareStatus(a: MonitoringStatus, b: MonitoringStatus): number {
  return exitCode(a) - exitCode(b);
}

/**
 * The most severe of the given statuses, or "OK" when none are given.
 */
export function worstStatus(...statuses: readonly MonitoringStatus[]): MonitoringStatus {
  let worst: MonitoringStatus = "OK";
  for (const status of statuses) {
    if (compareStatus(status, worst) > 0) {
      worst = status;
    }
  }
  return worst;
}
