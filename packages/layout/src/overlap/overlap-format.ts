import type { OverlapRecord, OverlayCoverage } from "./overlap-types";

/**
 * Renders a record as a single report line.
 */
export const formatOverlapRecord = (record: OverlapRecord): string => {
  switch (record.kind) {
    case "overlap": {
      return `${record.idA} overlaps ${record.idB} by ${record.amount}px`;
    }
    case "adjacent": {
      return `${record.idA} adjacent to ${record.idB}, gap=${record.gap}px`;
    }
    case "none": {
      return `${record.idA} clear of ${record.idB}`;
    }
  }
};

export const formatOverlayCoverage = (coverage: OverlayCoverage): string =>
  `${coverage.overlayId} covers ${coverage.baseId} by ${coverage.amount}px`;
