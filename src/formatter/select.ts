import type { Formatter } from "./formatter.js";
import { formatJson } from "./json.js";
import { formatText } from "./text.js";

/**
 * Supported output formats.
 */
export type OutputFormat = "text" | "json";

export function selectFormatter(format: OutputFormat): Formatter {
  switch (format) {
    case "text":
      return formatText;
    case "json":
      return formatJson;
  }
}
