/**
 * Parsing, evaluation and formatting of monitoring performance data:
 *
 *   'label'=value[UOM];[warn];[crit];[min];[max]
 *
 * as reported by Nagios-compatible check plugins.
 */

export * from "./types/index.js";
export * from "./perf/index.js";
export * from "./parser/index.js";
export * from "./formatter/index.js";
