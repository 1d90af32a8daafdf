import type { FreshnessStatus } from "./scoring/types";

export const RECENTLY_UPDATED_WINDOW_MS = 30 * 60 * 1000;

const SYNC_WINDOW = { startHour: 5, endHour: 11 } as const;

export interface FreshnessInputs {
  pending: boolean;
  hasScore: boolean;
  dataComplete: boolean;
  lastPublishedAt: number | null;
  now: number;
}

export function resolveFreshness(input: FreshnessInputs): FreshnessStatus {
  if (input.pending) return "computing";
  if (!input.hasScore || !input.dataComplete) return "waitingForData";
  if (input.lastPublishedAt != null && input.now - input.lastPublishedAt < RECENTLY_UPDATED_WINDOW_MS) {
    return "recentlyUpdated";
  }
  return "silent";
}

export type SyncPhase = "overnight" | "morning_sync" | "later";

export function syncPhase(localHour: number): SyncPhase {
  if (localHour < SYNC_WINDOW.startHour) return "overnight";
  if (localHour < SYNC_WINDOW.endHour) return "morning_sync";
  return "later";
}

export function freshnessMessage(status: FreshnessStatus, localHour: number): string | null {
  switch (status) {
    case "silent":
      return null;
    case "recentlyUpdated":
      return "Updated with your latest data.";
    case "computing":
      return "Updating with new data…";
    case "waitingForData":
      switch (syncPhase(localHour)) {
        case "overnight":
          return "Your score will fill in after you wake and your watch syncs.";
        case "morning_sync":
          return "Waiting for overnight data to sync from your watch.";
        case "later":
          return "Some data is still missing. Open the health app on your phone to sync your watch.";
      }
  }
}
