import type { Clock, PlaybackSession } from "./types";
import { systemClock } from "./types";
import { log } from "./log";

/** How long Plex may report "nothing playing" before we treat it as real. */
export const IDLE_DEBOUNCE_MS = 3000;

/** Offset drift beyond this while playing is a seek. */
export const SEEK_DRIFT_MS = 3000;

export type ChangeOutcome =
  | { kind: "changed"; session: PlaybackSession }
  | { kind: "unchanged"; session: PlaybackSession }
  | { kind: "waiting-idle" }
  | { kind: "became-idle" }
  | { kind: "none" };

export interface TrackerSnapshot {
  lastSession: PlaybackSession | null;
  lastPublishedAt: number | null;
  idleSince: number | null;
}

export function sameSession(a: PlaybackSession, b: PlaybackSession): boolean {
  return a.title === b.title && a.playerState === b.playerState && a.mediaKind === b.mediaKind;
}

export class SessionTracker {
  private lastSession: PlaybackSession | null = null;
  private lastPublishedAt: number | null = null;
  private idleSince: number | null = null;

  constructor(private readonly now: Clock = systemClock) {}

  record(session: PlaybackSession | null): ChangeOutcome {
    const now = this.now();

    if (!session) {
      if (!this.lastSession) {
        this.idleSince = null;
        return { kind: "none" };
      }
      if (this.idleSince === null) {
        this.idleSince = now;
        return { kind: "waiting-idle" };
      }
      if (now - this.idleSince >= IDLE_DEBOUNCE_MS) {
        this.lastSession = null;
        this.lastPublishedAt = null;
        this.idleSince = null;
        return { kind: "became-idle" };
      }
      return { kind: "waiting-idle" };
    }

    this.idleSince = null;
    const last = this.lastSession;

    if (!last || !sameSession(last, session) || this.hasSeeked(last, session, now)) {
      this.lastSession = session;
      this.lastPublishedAt = now;
      return { kind: "changed", session };
    }

    return { kind: "unchanged", session };
  }

  private hasSeeked(last: PlaybackSession, session: PlaybackSession, now: number): boolean {
    if (session.playerState !== "playing" || this.lastPublishedAt === null) return false;

    const expected = last.elapsed + (now - this.lastPublishedAt);
    const drift = Math.abs(session.elapsed - expected);
    if (drift > SEEK_DRIFT_MS) {
      log.debug(`Detected seek: drift ${drift}ms (expected ${expected}, got ${session.elapsed})`);
      return true;
    }
    return false;
  }

  current(): PlaybackSession | null {
    return this.lastSession;
  }

  snapshot(): TrackerSnapshot {
    return {
      lastSession: this.lastSession,
      lastPublishedAt: this.lastPublishedAt,
      idleSince: this.idleSince,
    };
  }

  reset(): void {
    this.lastSession = null;
    this.lastPublishedAt = null;
    this.idleSince = null;
  }
}
