import { confirm } from "@inquirer/prompts";
import type { PriorityChange } from "../gateway/priority-optimizer.js";

export function describeRanking(ranking: ReadonlyArray<PriorityChange>): string {
  return ranking.map((change) => change.provider).join(" > ");
}

/** Asks whether to apply `ranking` to the running session. */
export async function confirmRanking(ranking: ReadonlyArray<PriorityChange>): Promise<boolean> {
  return confirm({ message: `Apply ${describeRanking(ranking)} for this session?`, default: true });
}
