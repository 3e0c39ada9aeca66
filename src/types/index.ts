export { type Result, ok, err, partitionResults } from "./result.js";
export {
  type MonitoringStatus,
  type StatusDescriptor,
  MONITORING_STATUSES,
  exitCode,
  compareStatus,
  worstStatus,
} from "./status.js";
export {
  type MeasuredUnit,
  type UnitKind,
  type UnitValue,
  MEASURED_UNITS,
  UNIT_SUFFIXES,
  unitFromSuffix,
} from "./unit.js";
export {
  type NumberParseError,
  type PerfdataParseError,
  type PerfdataParseErrorKind,
  type PerfdataJsonError,
} from "./error.js";
