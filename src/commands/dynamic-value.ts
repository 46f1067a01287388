import type { Logger } from "../logger.js";
import { error_message } from "../utils/common.js";
import type { DynamicValue } from "./types.js";

export const RESOLVE_ERROR_SENTINEL = "<error getting value>";

export type Resolved<T> = T | typeof RESOLVE_ERROR_SENTINEL;

export function static_value<T>(value: T): DynamicValue<T> {
  return { kind: "static", value };
}

export function producer<T>(produce: () => T): DynamicValue<T> {
  return { kind: "producer", produce };
}

/** producer 예외는 전파하지 않고 sentinel 문자열로 대체한다. */
export function resolve_dynamic<T>(value: DynamicValue<T>, logger: Logger): Resolved<T> {
  if (value.kind === "static") return value.value;
  try {
    return value.produce();
  } catch (error) {
    logger.error("error getting dynamic value", { error: error_message(error) });
    return RESOLVE_ERROR_SENTINEL;
  }
}
