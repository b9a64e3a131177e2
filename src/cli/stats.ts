/**
 * Run summary formatting.
 */

import type { DetectionStats } from "../core/detect.js";
import { c } from "./colors.js";

function plural(count: number, word: string): string {
  return `${count} ${word}${count !== 1 ? "s" : ""}`;
}

export function formatStats(stats: DetectionStats, shown: number): string {
  const parts: string[] = [];

  parts.push(`${c.bold}${plural(stats.compared, "document")}${c.reset} compared`);
  parts.push(plural(stats.pairsCompared, "pair"));

  if (stats.pairsMatched === 0) {
    parts.push(`${c.dim}no matches${c.reset}`);
  } else if (shown < stats.pairsMatched) {
    parts.push(`${c.red}${stats.pairsMatched}${c.reset} above threshold (showing ${shown})`);
  } else {
    parts.push(`${c.red}${stats.pairsMatched}${c.reset} above threshold`);
  }

  const excluded = stats.sources - stats.compared;
  if (excluded > 0) {
    parts.push(`${c.yellow}${excluded}${c.reset} excluded`);
  }

  return parts.join(", ");
}
