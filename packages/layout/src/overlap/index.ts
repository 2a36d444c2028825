export type {
  OverlapRecord,
  OverlapSeverity,
  OverlapSummary,
  OverlayCoverage,
} from "./overlap-types";
export {
  DEFAULT_MINIMUM_GAP_PX,
  analyzeOverlayCoverage,
  analyzeOverlaps,
  findOverlap,
  summarizeOverlaps,
  type AnalyzeOverlapsOptions,
} from "./overlap-analyzer";
export { formatOverlapRecord, formatOverlayCoverage } from "./overlap-format";
