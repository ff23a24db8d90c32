export {
  Action,
  Data,
  Icon,
  Key,
  OutputItem,
  ResultType,
  ScriptFilterOutput,
  Text,
  normalizeModifierKey,
  normalizeResultType,
} from "./runtime/model";
export type {
  ActionInit,
  Argument,
  DataInit,
  IconType,
  ItemAction,
  ModifierMap,
  OutputItemInit,
  ScriptFilterOutputInit,
} from "./runtime/model";
export { Environment } from "./runtime/environment";
export type { EnvironmentInit } from "./runtime/environment";
export { scriptFilter } from "./runtime/script-filter";
export type { ScriptFilterHandler, ScriptFilterIO } from "./runtime/script-filter";
export { serialize } from "./runtime/serialize";
export { getLogger, Logger } from "./lib/log";
export type { LogLevel } from "./lib/log";
export { NodefredError, NodefredErrorCode } from "./lib/errors";
