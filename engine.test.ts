import { beforeEach, describe, expect, it, vi, type Mock } from "vitest";
import { PresenceEngine } from "./engine";
import { PresenceManager } from "./presence";
import { FetchError, PresenceConnectError, PresencePublishError } from "./errors";
import { SignalQueue } from "./signals";
import { episode, FakeSink, manualClock } from "./fixtures";
import type { ConnectionTarget, PlaybackSession, PushChannel } from "./types";

const owned: ConnectionTarget = { address: "10.0.0.2", port: 32400, owned: true };
const shared: ConnectionTarget = { address: "10.0.0.3", port: 32400, owned: false };

describe("PresenceEngine", () => {
  let clock: ReturnType<typeof manualClock>;
  let sink: FakeSink;
  let presence: PresenceManager;
  let fetchSession: Mock<(target: ConnectionTarget) => Promise<PlaybackSession | null>>;
  let openNotifications: Mock<(target: ConnectionTarget) => Promise<PushChannel>>;
  let engine: PresenceEngine;

  beforeEach(() => {
    clock = manualClock();
    sink = new FakeSink();
    presence = new PresenceManager(sink, { now: clock.now, sleep: async () => {} });
    fetchSession = vi.fn<(target: ConnectionTarget) => Promise<PlaybackSession | null>>();
    openNotifications = vi.fn<(target: ConnectionTarget) => Promise<PushChannel>>();
    engine = new PresenceEngine({
      source: { fetchSession, openNotifications },
      presence,
      now: clock.now,
    });
  });

  it("publishes the first session it sees", async () => {
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 0 }));

    await expect(engine.tick(owned, true)).resolves.toBe("Playing: Episode 3");
    expect(sink.activities).toHaveLength(1);
    expect(sink.activities[0]?.details).toBe("S1·E3 — Episode 3");
  });

  it("does not republish a session progressing normally", async () => {
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 0 }));
    await engine.tick(owned, true);

    clock.advance(1000);
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 1000 }));

    await expect(engine.tick(owned, true)).resolves.toBe("Playing: Episode 3");
    expect(sink.activities).toHaveLength(1);
  });

  it("republishes after a seek", async () => {
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 0 }));
    await engine.tick(owned, true);

    clock.advance(1000);
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 11_000 }));
    await engine.tick(owned, true);

    expect(sink.activities).toHaveLength(2);
    expect(sink.activities[1]?.startTimestamp).toBe(clock.now() - 11_000);
  });

  it("propagates fetch failures without touching state", async () => {
    const first = episode({ elapsed: 0 });
    fetchSession.mockResolvedValueOnce(first);
    await engine.tick(owned, true);

    clock.advance(3000);
    fetchSession.mockRejectedValueOnce(new FetchError("Could not reach Plex: ECONNRESET"));

    await expect(engine.tick(owned, true)).rejects.toBeInstanceOf(FetchError);
    expect(engine.lastSession()).toBe(first);
    expect(engine.lastStatus()).toBe("Playing: Episode 3");
  });

  it("recovers from a silent Discord disconnect with one reconnect", async () => {
    fetchSession.mockResolvedValueOnce(episode());
    await engine.tick(owned, true);

    sink.failSet = 1;
    fetchSession.mockResolvedValueOnce(episode({ playerState: "paused" }));

    await expect(engine.tick(owned, true)).resolves.toBe("Paused: Episode 3");
    expect(presence.reconnectCount()).toBe(1);
    expect(sink.activities).toHaveLength(2);
  });

  it("republishes an unchanged session once Discord comes back", async () => {
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 0 }));
    await engine.tick(owned, true);

    // Discord restarted: the old link is gone along with the activity it showed
    sink.live = false;
    sink.activities = [];
    clock.advance(3000);
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 3000 }));

    await expect(engine.tick(owned, true)).resolves.toBe("Playing: Episode 3");
    expect(sink.establishCalls).toBe(2);
    expect(sink.activities).toHaveLength(1);
    expect(sink.activities[0]?.details).toBe("S1·E3 — Episode 3");
  });

  it("reports why Discord is unreachable instead of the cooldown", async () => {
    sink.failEstablish = 3;
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 0 }));

    const failed = engine.tick(owned, true);
    await expect(failed).rejects.toBeInstanceOf(PresenceConnectError);
    await expect(failed).rejects.toThrow(/Is Discord running\?/);
    expect(sink.establishCalls).toBe(3);

    clock.advance(2000);
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 2000 }));

    await expect(engine.tick(owned, true)).resolves.toBe("Playing: Episode 3");
    expect(sink.activities).toHaveLength(1);
  });

  it("retries a failed publish on a later tick", async () => {
    await presence.connect();
    sink.failSet = 2;
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 0 }));

    await expect(engine.tick(owned, true)).rejects.toBeInstanceOf(PresencePublishError);

    clock.advance(1000);
    fetchSession.mockResolvedValueOnce(episode({ elapsed: 1000 }));

    await expect(engine.tick(owned, true)).resolves.toBe("Playing: Episode 3");
    expect(sink.activities).toHaveLength(1);
  });

  it("clears presence after the idle debounce", async () => {
    fetchSession.mockResolvedValueOnce(episode());
    await engine.tick(owned, true);

    clock.advance(1000);
    fetchSession.mockResolvedValueOnce(null);
    await expect(engine.tick(owned, true)).resolves.toBe("Waiting for idle debounce...");
    expect(sink.clears).toBe(0);

    clock.advance(3000);
    fetchSession.mockResolvedValueOnce(null);
    await expect(engine.tick(owned, true)).resolves.toBe("No active session");
    expect(sink.clears).toBe(1);
    expect(engine.lastSession()).toBeNull();
  });

  it("never publishes an idle player", async () => {
    fetchSession.mockResolvedValueOnce(episode({ playerState: "idle" }));

    await expect(engine.tick(owned, true)).resolves.toBe("No active session");
    expect(sink.activities).toHaveLength(0);
  });

  it("short-circuits when not authenticated", async () => {
    fetchSession.mockResolvedValueOnce(episode());
    await engine.tick(owned, true);

    await expect(engine.tick(owned, false)).resolves.toBe("Not authenticated");
    expect(sink.clears).toBe(1);
    expect(engine.lastSession()).toBeNull();
    expect(fetchSession).toHaveBeenCalledTimes(1);
  });

  it("reports a missing server", async () => {
    await expect(engine.tick(null, true)).resolves.toBe("No server selected");
    expect(fetchSession).not.toHaveBeenCalled();
  });

  it("only fetches a shared server when notified", async () => {
    const queue = new SignalQueue();
    openNotifications.mockResolvedValue(queue);
    fetchSession.mockResolvedValue(episode());

    await engine.tick(shared, true);
    await expect(engine.tick(shared, true)).resolves.toBe("Playing: Episode 3");
    expect(fetchSession).toHaveBeenCalledTimes(1);

    queue.push();
    await engine.tick(shared, true);
    expect(fetchSession).toHaveBeenCalledTimes(2);
    expect(openNotifications).toHaveBeenCalledTimes(1);
  });

  it("starts over when the server changes", async () => {
    const queue = new SignalQueue();
    openNotifications.mockResolvedValue(queue);
    fetchSession.mockResolvedValue(episode());
    await engine.tick(shared, true);

    await engine.tick(owned, true);

    expect(queue.isClosed()).toBe(true);
    expect(fetchSession).toHaveBeenCalledTimes(2);
    expect(sink.activities).toHaveLength(2);
  });

  it("drops session state when Plex rejects the token", async () => {
    fetchSession.mockResolvedValueOnce(episode());
    await engine.tick(owned, true);

    fetchSession.mockRejectedValueOnce(new FetchError("unauthorized", { status: 401, unauthorized: true }));

    await expect(engine.tick(owned, true)).rejects.toThrow("unauthorized");
    expect(engine.lastSession()).toBeNull();
  });

  it("discards an in-flight tick when reset lands first", async () => {
    let resolveFetch: (session: PlaybackSession | null) => void = () => {};
    fetchSession.mockReturnValueOnce(
      new Promise((resolve) => {
        resolveFetch = resolve;
      })
    );

    const pending = engine.tick(owned, true);
    await vi.waitFor(() => expect(fetchSession).toHaveBeenCalled());
    await engine.reset();
    resolveFetch(episode());

    await expect(pending).resolves.toBe("No active session");
    expect(engine.lastSession()).toBeNull();
    expect(sink.activities).toHaveLength(0);
  });

  it("takes back a publish when reset lands mid-update", async () => {
    let release: () => void = () => {};
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const deliver = sink.set.bind(sink);
    const set = vi.spyOn(sink, "set").mockImplementationOnce(async (activity) => {
      await gate;
      await deliver(activity);
    });
    fetchSession.mockResolvedValueOnce(episode());

    const pending = engine.tick(owned, true);
    await vi.waitFor(() => expect(set).toHaveBeenCalled());
    await engine.reset();
    release();

    await expect(pending).resolves.toBe("No active session");
    expect(engine.lastSession()).toBeNull();
    expect(sink.activities).toHaveLength(1);
    expect(sink.clears).toBe(2);
  });
});
