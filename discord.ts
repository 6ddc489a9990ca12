import { Client } from "@xhayper/discord-rpc";
import { ActivityType } from "discord-api-types/v10";
import type { PresenceActivity, PresenceSink } from "./types";
import { log } from "./log";

// Discord needs at least 2 characters and at most 128 per text field
export function fitField(value: string | undefined): string | undefined {
  if (!value) return undefined;
  let text = value.length < 2 ? `${value} ` : value;
  if (text.length > 128) text = text.substring(0, 128);
  return text;
}

const ACTIVITY_TYPES = {
  watching: ActivityType.Watching,
  listening: ActivityType.Listening,
} as const;

/**
 * Presence sink backed by Discord's local RPC socket. Each `establish()`
 * builds a fresh client, since a dropped IPC pipe can't be reused.
 */
export class DiscordPresence implements PresenceSink {
  private client: Client | null = null;
  private ready = false;

  constructor(private readonly clientId: string) {}

  async establish(): Promise<void> {
    await this.destroy();

    const rpc = new Client({ clientId: this.clientId });
    this.client = rpc;

    rpc.on("ready", () => {
      if (this.client !== rpc) return;
      log.info(`✅ Connected to Discord as ${rpc.user?.username ?? "unknown user"}`);
      this.ready = true;
    });

    rpc.on("disconnected", () => {
      if (this.client !== rpc) return;
      log.info("❌ Disconnected from Discord");
      this.ready = false;
    });

    await rpc.login();
    this.ready = true;
  }

  async set(activity: PresenceActivity): Promise<void> {
    const user = this.client?.user;
    if (!user) throw new Error("Discord client is not ready");

    await user.setActivity({
      type: ACTIVITY_TYPES[activity.kind],
      details: fitField(activity.details),
      state: fitField(activity.state),
      startTimestamp: activity.startTimestamp !== undefined ? new Date(activity.startTimestamp) : undefined,
      endTimestamp: activity.endTimestamp !== undefined ? new Date(activity.endTimestamp) : undefined,
      largeImageKey: activity.largeImage,
      largeImageText: fitField(activity.largeText),
      smallImageKey: activity.smallImage,
      smallImageText: fitField(activity.smallText),
    });
  }

  async clear(): Promise<void> {
    const user = this.client?.user;
    if (!user) throw new Error("Discord client is not ready");
    await user.clearActivity();
  }

  async destroy(): Promise<void> {
    const rpc = this.client;
    this.client = null;
    this.ready = false;
    if (rpc) await rpc.destroy();
  }

  isLive(): boolean {
    return this.ready && this.client !== null;
  }
}
