import type { ShotRecord, ShotTable } from "@/lib/domain/types";
import { orderColumns } from "@/lib/ingest/normalize";

export function shot(over: Partial<ShotRecord> = {}): ShotRecord {
  return {
    Club: "Driver",
    Carry: null,
    Total: null,
    Offline: null,
    ClubSpeed: null,
    BallSpeed: null,
    Smash: null,
    HLA: null,
    VLA: null,
    BackSpin: null,
    SpinAxis: null,
    SpinTotal: null,
    SpinLat: null,
    PeakHeight: null,
    DescAngle: null,
    SessionDate: "2025-03-01",
    PlayerRaw: "Conre",
    Alias: "Sportsman",
    Hand: "R",
    IsDriver: true,
    extras: {},
    ...over,
  };
}

export function table(rows: ShotRecord[], columns: string[] = ["Club", "Carry", "Offline"]): ShotTable {
  return { columns: orderColumns(["SessionDate", "Alias", "PlayerRaw", "Hand", "IsDriver", ...columns]), rows };
}

// Sportsman: three drives (150/10 L, 130/25 R, 100/5 R) and one 7 iron.
export function sportsmanRows(): ShotRecord[] {
  return [
    shot({ Carry: 150, Offline: -10, Smash: 1.45 }),
    shot({ Carry: 130, Offline: 25, Smash: 1.41 }),
    shot({ Carry: 100, Offline: 5, Smash: 1.3 }),
    shot({ Club: "7I", IsDriver: false, Carry: 140, Offline: 2 }),
  ];
}
