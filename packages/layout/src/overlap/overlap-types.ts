export type OverlapSeverity = "none" | "touching" | "overlapping";

interface OverlapPair {
  idA: string;
  idB: string;
  severity: OverlapSeverity;
}

/**
 * Classification of one unordered pair of base widgets.
 */
export type OverlapRecord =
  | (OverlapPair & { kind: "none" })
  | (OverlapPair & { kind: "adjacent"; gap: number })
  | (OverlapPair & { kind: "overlap"; amount: number });

/**
 * Base widget painted over by an active overlay.
 */
export interface OverlayCoverage {
  overlayId: string;
  baseId: string;
  amount: number;
}

export interface OverlapSummary {
  pairs: number;
  overlapping: number;
  touching: number;
}
