import type { Clock, ConnectionTarget, PlaybackSession, PushChannel, RemoteStateSource } from "./types";
import { systemClock, targetKey } from "./types";
import { errorMessage, FetchError } from "./errors";
import { SessionTracker } from "./tracker";
import { StrategySelector } from "./strategy";
import {
  actionFor,
  activeSession,
  describeOutcome,
  STATUS_NO_SERVER,
  STATUS_NO_SESSION,
  STATUS_NOT_AUTHENTICATED,
} from "./detector";
import { PresenceManager } from "./presence";
import { log } from "./log";

export interface EngineOptions {
  source: RemoteStateSource;
  presence: PresenceManager;
  now?: Clock;
}

/**
 * Drives one synchronization pass per `tick`. Ticks must not overlap; the
 * caller serializes them. `reset()` may land while a tick is awaiting I/O,
 * in which case that tick's results are dropped.
 */
export class PresenceEngine {
  private readonly source: RemoteStateSource;
  private readonly presence: PresenceManager;
  private readonly tracker: SessionTracker;
  private readonly strategy: StrategySelector;

  private subscription: PushChannel | null = null;
  private target: string | null = null;
  private status = STATUS_NO_SESSION;
  private needsPublish = false;
  private publishedLink = 0;
  private epoch = 0;

  constructor(options: EngineOptions) {
    this.source = options.source;
    this.presence = options.presence;
    this.tracker = new SessionTracker(options.now ?? systemClock);
    this.strategy = new StrategySelector(this.source);
  }

  lastSession(): PlaybackSession | null {
    return this.tracker.current();
  }

  lastStatus(): string {
    return this.status;
  }

  async tick(target: ConnectionTarget | null, authenticated: boolean): Promise<string> {
    if (!authenticated) {
      return this.idleOut(STATUS_NOT_AUTHENTICATED);
    }
    if (!target) {
      return this.idleOut(STATUS_NO_SERVER);
    }

    const key = targetKey(target);
    if (this.target !== null && this.target !== key) {
      log.info(`🔀 Server changed to ${key}, starting over`);
      this.discardState();
    }
    this.target = key;

    const epoch = this.epoch;

    // Connect early so the first publish doesn't pay for the handshake
    let connectError: unknown = null;
    if (!this.presence.isConnected()) {
      try {
        await this.presence.connect();
      } catch (error) {
        connectError = error;
        log.debug(`Discord not ready yet: ${errorMessage(error)}`);
      }
      if (epoch !== this.epoch) return this.status;
    }

    const state = { subscription: this.subscription, lastSession: this.tracker.current() };
    const decision = await this.strategy.decide(target, state);
    if (epoch !== this.epoch) {
      state.subscription?.close();
      return this.status;
    }
    this.subscription = state.subscription;

    if (decision === "skip-fetch") {
      return this.status;
    }

    let fetched: PlaybackSession | null;
    try {
      fetched = await this.source.fetchSession(target);
    } catch (error) {
      if (epoch === this.epoch && error instanceof FetchError && error.unauthorized) {
        log.warn("Plex no longer accepts our token, dropping session state");
        this.discardState();
      }
      throw error;
    }
    if (epoch !== this.epoch) return this.status;

    const outcome = this.tracker.record(activeSession(fetched));
    this.status = describeOutcome(outcome);

    if (outcome.kind === "changed") {
      log.info(`🎬 ${this.status}`);
    }

    // A rebuilt Discord link shows nothing until we send the session again
    const relinked = this.presence.linkGeneration() !== this.publishedLink;
    const action = actionFor(outcome, this.needsPublish || relinked);
    if (action.kind === "publish") {
      this.needsPublish = true;
      // Report why Discord is down rather than the cooldown it left behind
      if (connectError && !this.presence.isConnected()) throw connectError;
      await this.presence.publish(action.session);
      if (epoch !== this.epoch) {
        // A reset landed mid-publish; take back what we just sent
        await this.presence.clear();
        return this.status;
      }
      this.needsPublish = false;
      this.publishedLink = this.presence.linkGeneration();
    } else if (action.kind === "clear") {
      log.info("⏸️  Playback stopped, clearing presence");
      this.needsPublish = false;
      await this.presence.clear();
    }

    return this.status;
  }

  /** Logout / disconnect. Always wins over a tick still in flight. */
  async reset(): Promise<void> {
    this.epoch++;
    this.discardState();
    this.target = null;
    await this.presence.clear();
  }

  private async idleOut(status: string): Promise<string> {
    if (this.tracker.current() || this.subscription || this.target) {
      this.epoch++;
      this.discardState();
      this.target = null;
    }
    this.status = status;
    await this.presence.clear();
    return status;
  }

  private discardState(): void {
    this.tracker.reset();
    this.subscription?.close();
    this.subscription = null;
    this.needsPublish = false;
    this.status = STATUS_NO_SESSION;
  }
}
