import type { TokenId, TrackTable } from '../types';

export function createTrackTable(): TrackTable {
  return { starts: [null], ends: [[]] };
}

/** Allocate the next unused track number without a start token yet (spine add) */
export function reserveTrack(table: TrackTable): number {
  table.starts.push(null);
  table.ends.push([]);
  return table.starts.length - 1;
}

/**
 * Record the exclusive interpretation that opens a track.
 * With no track given, the next unused number is allocated.
 */
export function openTrack(table: TrackTable, token: TokenId, track?: number): number {
  const number = track ?? reserveTrack(table);
  table.starts[number] = token;
  return number;
}

/** Append a terminator to the track's end list */
export function closeTrack(table: TrackTable, track: number, token: TokenId): void {
  table.ends[track].push(token);
}

/** True if the track number was allocated but its exclusive interpretation has not been seen */
export function isTrackPending(table: TrackTable, track: number): boolean {
  return track > 0 && track < table.starts.length && table.starts[track] === null;
}

export function getMaxTrackNumber(table: TrackTable): number {
  return table.starts.length - 1;
}

export function getTrackStartId(table: TrackTable, track: number): TokenId | null {
  if (track <= 0 || track >= table.starts.length) return null;
  return table.starts[track];
}

export function getTrackEndIds(table: TrackTable, track: number): TokenId[] {
  if (track <= 0 || track >= table.ends.length) return [];
  return table.ends[track];
}
