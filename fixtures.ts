import type { PlaybackSession, PresenceActivity, PresenceSink } from "./types";

export function episode(overrides: Partial<PlaybackSession> = {}): PlaybackSession {
  return {
    title: "Episode 3",
    index: 3,
    parentIndex: 1,
    parentTitle: "Season 1",
    grandparentTitle: "Test Show",
    playerState: "playing",
    mediaKind: "episode",
    duration: 1_800_000,
    elapsed: 0,
    artwork: null,
    ...overrides,
  };
}

export function manualClock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance(ms: number) {
      current += ms;
    },
  };
}

export class FakeSink implements PresenceSink {
  live = false;
  establishCalls = 0;
  destroyCalls = 0;
  clears = 0;
  activities: PresenceActivity[] = [];

  // Number of upcoming calls that should fail
  failEstablish = 0;
  failSet = 0;
  failClear = 0;

  async establish(): Promise<void> {
    this.establishCalls++;
    if (this.failEstablish > 0) {
      this.failEstablish--;
      throw new Error("connection refused");
    }
    this.live = true;
  }

  async set(activity: PresenceActivity): Promise<void> {
    if (this.failSet > 0) {
      this.failSet--;
      throw new Error("pipe closed");
    }
    this.activities.push(activity);
  }

  async clear(): Promise<void> {
    if (this.failClear > 0) {
      this.failClear--;
      throw new Error("pipe closed");
    }
    this.clears++;
  }

  async destroy(): Promise<void> {
    this.destroyCalls++;
    this.live = false;
  }

  isLive(): boolean {
    return this.live;
  }
}
