import type { CompletionStatus } from "../domain/campaigns/types.js";
import type { StepValue } from "../domain/steps/types.js";

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

export function formatStepValue(v: StepValue): string {
  switch (v.kind) {
    case "MISSING":
      return "-";
    case "CAPPED":
      return "30k+";
    case "NUMERIC":
      return formatCount(v.steps);
  }
}

export function formatCompletion(s: CompletionStatus): string {
  switch (s.type) {
    case "NOT_YET_DUE":
      return "-";
    case "COMPLETE":
      return "Complete";
    case "PARTIAL":
      return `Failed(${s.completedDays}/${s.requiredDays})`;
  }
}
