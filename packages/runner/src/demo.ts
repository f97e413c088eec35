import type { SyntheticArtifact } from "@neurocue/adapters";

/**
 * Repeating demo script for the synthetic source. Each round: blink,
 * hold still through PREPARE, then clench (NEXT) or move the head
 * (PREVIOUS), alternating. The first round starts once calibration has
 * had time to finish.
 */
export function demoScript(rounds: number, startSeconds = 4, roundSeconds = 9): SyntheticArtifact[] {
  const artifacts: SyntheticArtifact[] = [];
  for (let round = 0; round < rounds; round++) {
    const start = startSeconds + round * roundSeconds;
    artifacts.push({ kind: "blink", atSeconds: start, durationSeconds: 0.3 });
    artifacts.push({
      kind: round % 2 === 0 ? "clench" : "head-move",
      atSeconds: start + 4,
      durationSeconds: 1,
    });
  }
  return artifacts;
}
