import type { ConnectionTarget, PlaybackSession, PushChannel, RemoteStateSource } from "./types";
import { errorMessage } from "./errors";
import { log } from "./log";

export type FetchDecision = "fetch-now" | "skip-fetch";

export interface StrategyState {
  subscription: PushChannel | null;
  lastSession: PlaybackSession | null;
}

/**
 * Owned servers are polled every tick. Shared servers are only fetched when
 * the notification socket says something changed, so we don't hammer a
 * server we don't control.
 */
export class StrategySelector {
  constructor(private readonly source: Pick<RemoteStateSource, "openNotifications">) {}

  async decide(target: ConnectionTarget, state: StrategyState): Promise<FetchDecision> {
    const decision = target.owned ? "fetch-now" : await this.decideShared(target, state);

    // Never delay the very first observation
    if (!state.lastSession) return "fetch-now";
    return decision;
  }

  private async decideShared(target: ConnectionTarget, state: StrategyState): Promise<FetchDecision> {
    if (!state.subscription) {
      try {
        state.subscription = await this.source.openNotifications(target);
        log.debug(`Subscribed to notifications on ${target.address}:${target.port}`);
      } catch (error) {
        log.warn(`Notification socket unavailable (${errorMessage(error)}), falling back to polling`);
      }
      return "fetch-now";
    }

    const { signals, closed } = state.subscription.drain();
    if (closed) {
      log.warn("Notification socket closed, will reconnect next tick");
      state.subscription.close();
      state.subscription = null;
      return "fetch-now";
    }

    return signals > 0 ? "fetch-now" : "skip-fetch";
  }
}
