export { parseNumber } from "./number.js";
export { parseThresholdRange } from "./threshold.js";
export { parsePerfdata } from "./perfdata.js";
export {
  type TokenParseFailure,
  type ParsedPerfdataSet,
  splitTokens,
  parsePerfdataList,
  parsePerfdataSet,
} from "./list.js";
export { parseJson } from "./json.js";
