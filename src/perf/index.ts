export { ThresholdRange } from "./threshold-range.js";
export { Perfdata } from "./perfdata.js";
export { PerfdataSet } from "./perfdata-set.js";
