// Domain models for the canonical shot table

export type Hand = "L" | "R";

export type RosterEntry = {
  name: string; // key as written in the roster file
  alias: string;
  hand: Hand;
};

export type Roster = {
  players: ReadonlyMap<string, RosterEntry>; // normalized name key -> entry
};

export type Identity = {
  playerRaw: string;
  alias: string;
  hand: Hand;
  resolved: boolean;
};

// Canonical numeric fields, named as they appear in the Shots sheet.
export const NUMERIC_FIELDS = [
  "Carry",
  "Total",
  "Offline",
  "ClubSpeed",
  "BallSpeed",
  "Smash",
  "HLA",
  "VLA",
  "BackSpin",
  "SpinAxis",
  "SpinTotal",
  "SpinLat",
  "PeakHeight",
  "DescAngle",
] as const;

export type NumericField = (typeof NUMERIC_FIELDS)[number];

export const META_FIELDS = ["SessionDate", "PlayerRaw", "Alias", "Hand", "IsDriver"] as const;

export type MetaField = (typeof META_FIELDS)[number];

export type CanonicalColumn = "Club" | NumericField | MetaField;

export type ShotRecord = {
  Club: string | null;
  Carry: number | null; // m
  Total: number | null; // m
  Offline: number | null; // m, negative = left
  ClubSpeed: number | null; // mph
  BallSpeed: number | null; // mph
  Smash: number | null;
  HLA: number | null; // deg, negative = left
  VLA: number | null; // deg
  BackSpin: number | null; // rpm
  SpinAxis: number | null; // deg, negative = left
  SpinTotal: number | null; // rpm, derived
  SpinLat: number | null; // rpm, derived
  PeakHeight: number | null; // m
  DescAngle: number | null; // deg
  SessionDate: string; // YYYY-MM-DD
  PlayerRaw: string;
  Alias: string;
  Hand: Hand;
  IsDriver: boolean;
  extras: Record<string, string>; // unrecognized vendor columns, untouched
};

export type ShotTable = {
  columns: string[]; // canonical and extra columns present, in output order
  rows: ShotRecord[];
};

export type SessionAggregate = {
  SessionDate: string;
  Alias: string;
  Hand: Hand;
  TotalShots: number;
  ClubsPlayed: number | null;
  Driver_Fairway_Count: number;
  Driver_Shots_Carry_gt120: number;
  Driver_AvgCarry_gt120: number | null; // null = not available
};

export type PlayerDriverSummary = {
  Alias: string;
  N: number;
  AvgCarry: number | null;
  StdCarry: number | null;
  AvgOffline: number | null;
  StdOffline: number | null;
  AvgAbsOffline: number | null;
  FairwayPct: number | null;
  AvgSmash: number | null;
  AvgBackSpin: number | null;
  AvgSpinAxis: number | null;
  AvgSpinLat: number | null;
  AvgHLA: number | null;
  AvgVLA: number | null;
  AvgPeakHeight: number | null;
};

export type UnresolvedIdentityWarning = {
  kind: "unresolved_identity";
  file: string;
  playerRaw: string;
};

export type DerivedMetricUndefined = {
  kind: "derived_metric_undefined";
  metric: "SpinTotal" | "Smash";
  count: number;
};

export type BatchWarning = UnresolvedIdentityWarning | DerivedMetricUndefined;

export type IngestSummary = {
  files: number;
  rows: number;
  parse_errors: number;
  unknown_columns: string[];
};
