import type { Monitor } from "../monitor/monitor.js";
import type { RiskConfig } from "../utils/config.js";

export interface ToolContext {
  monitor: Monitor;
  risk: RiskConfig;
}

/** JSON for tool output: unbounded distances read "unbounded", errors read as their message. */
export function toJson(value: unknown): string {
  return JSON.stringify(
    value,
    (_key, v: unknown) => {
      if (v === Number.POSITIVE_INFINITY) return "unbounded";
      if (v instanceof Error) return v.message;
      return v;
    },
    2
  );
}

export function textResult(text: string) {
  return { content: [{ type: "text" as const, text }] };
}

export function errorResult(action: string, err: unknown) {
  return textResult(`Error ${action}: ${err instanceof Error ? err.message : String(err)}`);
}
