export type PlayerState = "playing" | "paused" | "buffering" | "idle";

export type MediaKind = "episode" | "movie" | "track" | "unknown" | "idle";

/**
 * Snapshot of what is currently playing on the Plex server.
 * `duration` and `elapsed` are milliseconds; remote data may report
 * `elapsed > duration`, so neither is clamped here.
 */
export interface PlaybackSession {
  title: string;
  index: number | null;
  parentIndex: number | null;
  parentTitle: string | null;
  grandparentTitle: string | null;
  playerState: PlayerState;
  mediaKind: MediaKind;
  duration: number;
  elapsed: number;
  artwork: string | null;
}

/**
 * Which Plex server to query. `owned` only changes how we fetch
 * (poll vs push), not which server this is.
 */
export interface ConnectionTarget {
  name?: string;
  address: string;
  port: number;
  owned: boolean;
}

export function targetKey(target: ConnectionTarget): string {
  return `${target.address}:${target.port}`;
}

export interface DrainResult {
  signals: number;
  closed: boolean;
}

/** Live "something changed" subscription. Signals carry no payload. */
export interface PushChannel {
  drain(): DrainResult;
  close(): void;
}

export interface RemoteStateSource {
  fetchSession(target: ConnectionTarget): Promise<PlaybackSession | null>;
  openNotifications(target: ConnectionTarget): Promise<PushChannel>;
}

export type ActivityKind = "watching" | "listening";

/** Display payload handed to the presence sink. Timestamps are epoch ms. */
export interface PresenceActivity {
  kind: ActivityKind;
  details?: string;
  state?: string;
  startTimestamp?: number;
  endTimestamp?: number;
  largeImage?: string;
  largeText?: string;
  smallImage?: string;
  smallText?: string;
}

export interface PresenceSink {
  establish(): Promise<void>;
  set(activity: PresenceActivity): Promise<void>;
  clear(): Promise<void>;
  destroy(): Promise<void>;
  isLive(): boolean;
}

export type Clock = () => number;

export type Sleep = (ms: number) => Promise<void>;

export const systemClock: Clock = () => Date.now();

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));
