import type { Clock, PlaybackSession, PresenceActivity, PresenceSink, Sleep } from "./types";
import { sleep as defaultSleep, systemClock } from "./types";
import { errorMessage, PresenceConnectError, PresencePublishError } from "./errors";
import { log } from "./log";

export const MAX_CONNECT_ATTEMPTS = 3;
export const CONNECT_BACKOFF_MS = 500;
export const RECONNECT_COOLDOWN_MS = 2000;

export type ConnectionState = "disconnected" | "connected";

export interface PresenceManagerOptions {
  now?: Clock;
  sleep?: Sleep;
  maxAttempts?: number;
  backoffMs?: number;
  cooldownMs?: number;
}

const SMALL_ICONS = {
  paused: { image: "pause-circle", text: "Paused" },
  buffering: { image: "sand-clock", text: "Buffering" },
  idle: { image: "sleep-mode", text: "Idle" },
} as const;

function displayText(session: PlaybackSession): Pick<PresenceActivity, "kind" | "details" | "state"> {
  switch (session.mediaKind) {
    case "episode": {
      const details =
        session.parentIndex !== null && session.index !== null
          ? `S${session.parentIndex}·E${session.index} — ${session.title}`
          : session.title;
      return { kind: "watching", details, state: session.grandparentTitle ?? undefined };
    }
    case "movie":
      return { kind: "watching", details: session.title };
    case "track":
      return { kind: "listening", details: session.title, state: session.grandparentTitle ?? undefined };
    default: {
      const details = [session.grandparentTitle, session.parentTitle].filter(Boolean).join(" - ");
      return { kind: "watching", details: details || undefined, state: session.title };
    }
  }
}

/**
 * Maps a session to what Discord shows. While playing we send start/end
 * timestamps so Discord renders the countdown itself; otherwise a small
 * icon marks the paused/buffering/idle state.
 */
export function buildActivity(session: PlaybackSession, now: number): PresenceActivity {
  const activity: PresenceActivity = displayText(session);

  if (session.artwork) {
    activity.largeImage = session.artwork;
    activity.largeText = session.title;
  }

  if (session.playerState === "playing") {
    activity.startTimestamp = now - session.elapsed;
    activity.endTimestamp = now + Math.max(0, session.duration - session.elapsed);
  } else {
    const icon = SMALL_ICONS[session.playerState];
    activity.smallImage = icon.image;
    activity.smallText = icon.text;
  }

  return activity;
}

/**
 * Owns the Discord RPC link. Retry state is plain data so the policy
 * can be tested against a fake sink.
 */
export class PresenceManager {
  private state: ConnectionState = "disconnected";
  private lastAttemptAt: number | null = null;
  private reconnects = 0;
  private links = 0;

  private readonly now: Clock;
  private readonly sleep: Sleep;
  private readonly maxAttempts: number;
  private readonly backoffMs: number;
  private readonly cooldownMs: number;

  constructor(private readonly sink: PresenceSink, options: PresenceManagerOptions = {}) {
    this.now = options.now ?? systemClock;
    this.sleep = options.sleep ?? defaultSleep;
    this.maxAttempts = options.maxAttempts ?? MAX_CONNECT_ATTEMPTS;
    this.backoffMs = options.backoffMs ?? CONNECT_BACKOFF_MS;
    this.cooldownMs = options.cooldownMs ?? RECONNECT_COOLDOWN_MS;
  }

  connectionState(): ConnectionState {
    return this.state;
  }

  /** Number of forced reconnects performed after a failed update. */
  reconnectCount(): number {
    return this.reconnects;
  }

  /** Bumped on every successful handshake; a new link starts with no activity shown. */
  linkGeneration(): number {
    return this.links;
  }

  isConnected(): boolean {
    if (this.state === "connected" && !this.sink.isLive()) {
      this.state = "disconnected";
    }
    return this.state === "connected";
  }

  async connect(): Promise<void> {
    if (this.isConnected()) return;

    if (this.lastAttemptAt !== null) {
      const since = this.now() - this.lastAttemptAt;
      if (since < this.cooldownMs) {
        throw new PresenceConnectError(
          `Too soon to reconnect to Discord, waiting for cooldown (${this.cooldownMs - since}ms left)`
        );
      }
    }

    await this.establish();
  }

  async publish(session: PlaybackSession): Promise<void> {
    if (!this.isConnected()) {
      log.info("🔌 Connecting to Discord...");
      await this.connect();
    }

    const activity = buildActivity(session, this.now());
    log.debug(`Updating presence: ${activity.kind} "${activity.details ?? ""}" / "${activity.state ?? ""}"`);

    try {
      await this.sink.set(activity);
    } catch (error) {
      log.warn(`Failed to set activity, reconnecting: ${errorMessage(error)}`);
      try {
        await this.forceReconnect();
        await this.sink.set(activity);
      } catch (retryError) {
        throw new PresencePublishError(
          `Failed to update Discord after reconnect: ${errorMessage(retryError)}`,
          { cause: retryError }
        );
      }
    }
  }

  /** Best effort: a failed clear is logged, never thrown. */
  async clear(): Promise<void> {
    try {
      await this.connect();
    } catch (error) {
      log.debug(`Skipping presence clear: ${errorMessage(error)}`);
      return;
    }

    try {
      await this.sink.clear();
    } catch (error) {
      log.warn(`Failed to clear activity, reconnecting: ${errorMessage(error)}`);
      try {
        await this.forceReconnect();
        await this.sink.clear();
      } catch (retryError) {
        log.warn(`Could not clear Discord presence: ${errorMessage(retryError)}`);
      }
    }
  }

  async disconnect(): Promise<void> {
    this.state = "disconnected";
    try {
      await this.sink.destroy();
    } catch (error) {
      log.debug(`Discord client teardown failed: ${errorMessage(error)}`);
    }
  }

  /** Tears the link down and rebuilds it immediately, skipping the cooldown. */
  private async forceReconnect(): Promise<void> {
    this.reconnects++;
    await this.disconnect();
    await this.establish();
  }

  private async establish(): Promise<void> {
    this.lastAttemptAt = this.now();

    let lastError: unknown;
    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      try {
        await this.sink.establish();
        this.state = "connected";
        this.links++;
        log.debug(`Connected to Discord on attempt ${attempt}`);
        return;
      } catch (error) {
        lastError = error;
        log.warn(`Discord connection attempt ${attempt} failed: ${errorMessage(error)}`);
        if (attempt < this.maxAttempts) {
          await this.sleep(this.backoffMs * attempt);
        }
      }
    }

    this.state = "disconnected";
    throw new PresenceConnectError(
      `Failed to connect to Discord after ${this.maxAttempts} attempts. Is Discord running?`,
      { cause: lastError }
    );
  }
}
