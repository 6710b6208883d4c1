export { transform, toNode } from "./walker";
export { anonymizeValue, isIdField, fillText, TYPE_PLACEHOLDERS } from "./anonymizer";
export { classifyPattern, isEmail, isUrl, isIPv4, isPhone } from "./matchers";
export { extract, DEFAULT_RAWSTRING_FIELD } from "./extractor";
export { runExtract, runTransform, defaultOutputPath } from "./pipeline";
export { StatsAccumulator, formatSummary } from "./stats";
export {
  ConfigManager,
  buildPolicy,
  defaultPolicy,
  parseConfig,
  ProcessorConfigSchema,
} from "./config";
export { digest, digestId } from "./utils/hash";
export { parseJSON, serializeJSON, isJSONValue } from "./utils/json";
export { RawscrubError, DepthLimitError } from "./errors";
export { main } from "./cli";

export type {
  AnonymizationPolicy,
  JSONValue,
  JSONNumber,
  JSONNode,
  ProcessingMode,
  RunReport,
  RunStats,
} from "./types";
export type { ExtractResult, SkippedRecord } from "./extractor";
export type { ProcessorConfig, ProcessorConfigInput } from "./config";
