import type { Hand } from "@/lib/domain/types";

// Coaching policy. Aggregates and reports both read these through `Policy`
// so the "good drive" and fairway rules cannot drift apart.
export const GOOD_DRIVE_CARRY_M = 120;
export const FAIRWAY_HALF_WIDTH_M = 20;
export const SMASH_MAX = 1.5;

export const UNKNOWN_ALIAS = "UNKNOWN";
export const DEFAULT_HAND: Hand = "R";
export const GROUP_LABEL = "GROUPE";

export const STUDENT_REPORT_LETTERS = ["A", "B", "C", "D", "E", "F", "G", "H"] as const;
export const GROUP_REPORT_LETTERS = ["C", "D", "F", "G", "H"] as const;

export const BASE_WORKBOOK_NAME = "Base_Coaching_Golf.xlsx";

// Below this many finite points a dispersion ellipse is not drawn.
export const MIN_ELLIPSE_POINTS = 5;
// |spin axis| under this is reported as a neutral flight.
export const NEUTRAL_SPIN_AXIS_DEG = 0.2;

export type Policy = {
  goodDriveCarryM: number;
  fairwayHalfWidthM: number;
  smashMax: number;
};

export const DEFAULT_POLICY: Policy = {
  goodDriveCarryM: GOOD_DRIVE_CARRY_M,
  fairwayHalfWidthM: FAIRWAY_HALF_WIDTH_M,
  smashMax: SMASH_MAX,
};
