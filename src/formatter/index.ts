export { type Formatter, type FormatterOptions } from "./formatter.js";
export { formatNumber } from "../perf/number.js";
export { formatText } from "./text.js";
export {
  type JsonNumber,
  type ThresholdRangeJson,
  type PerfdataJson,
  type PerfdataSetJson,
  toJsonNumber,
  toPerfdataJson,
  toPerfdataSetJson,
  formatJson,
} from "./json.js";
export { type OutputFormat, selectFormatter } from "./select.js";
