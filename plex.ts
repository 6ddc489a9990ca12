import WebSocket from "ws";
import { z } from "zod";
import type {
  ConnectionTarget,
  MediaKind,
  PlaybackSession,
  PlayerState,
  PushChannel,
  RemoteStateSource,
  Sleep,
} from "./types";
import { sleep as defaultSleep } from "./types";
import { errorMessage, FetchError, PushChannelError } from "./errors";
import { SignalQueue } from "./signals";
import { log } from "./log";

const PLEX_TV_API = "https://plex.tv/api/v2";
const PRODUCT = "Plex Discord Presence";
const VERSION = "1.0.0";

const MAX_RETRIES = 3;
const RETRY_DELAY_MS = 1000;
const REQUEST_TIMEOUT_MS = 10000;

const PlexSessionSchema = z.object({
  type: z.string(),
  title: z.string(),
  index: z.number().optional(),
  parentIndex: z.number().optional(),
  parentTitle: z.string().optional(),
  grandparentTitle: z.string().optional(),
  duration: z.number().default(0),
  viewOffset: z.number().default(0),
  thumb: z.string().optional(),
  grandparentThumb: z.string().optional(),
  Player: z.object({ state: z.string() }),
  User: z.object({ title: z.string() }),
});

const SessionsResponseSchema = z.object({
  MediaContainer: z.object({
    Metadata: z.array(PlexSessionSchema).default([]),
  }),
});

const ResourceSchema = z.object({
  name: z.string(),
  owned: z.boolean().default(false),
  provides: z.string().optional(),
  connections: z
    .array(
      z.object({
        address: z.string(),
        port: z.number(),
        local: z.boolean().default(false),
      })
    )
    .default([]),
});

const ResourcesResponseSchema = z.array(ResourceSchema);

type PlexSession = z.infer<typeof PlexSessionSchema>;

export interface PlexServer {
  name: string;
  address: string;
  port: number;
  owned: boolean;
}

export interface PlexClientOptions {
  token: string;
  username: string;
  clientIdentifier: string;
  sleep?: Sleep;
}

const PLAYER_STATES: Record<string, PlayerState> = {
  playing: "playing",
  paused: "paused",
  buffering: "buffering",
};

const MEDIA_KINDS: Record<string, MediaKind> = {
  episode: "episode",
  movie: "movie",
  track: "track",
};

// Preference order when the user has several streams open
const STATE_PRIORITY = ["playing", "buffering", "paused"];

export function toPlaybackSession(target: ConnectionTarget, raw: PlexSession): PlaybackSession {
  const thumb = raw.thumb ?? raw.grandparentThumb;
  return {
    title: raw.title,
    index: raw.index ?? null,
    parentIndex: raw.parentIndex ?? null,
    parentTitle: raw.parentTitle ?? null,
    grandparentTitle: raw.grandparentTitle ?? null,
    playerState: PLAYER_STATES[raw.Player.state] ?? "idle",
    mediaKind: MEDIA_KINDS[raw.type] ?? "unknown",
    duration: raw.duration,
    elapsed: raw.viewOffset,
    artwork: thumb ? `http://${target.address}:${target.port}/${thumb.replace(/^\/+/, "")}` : null,
  };
}

export function pickUserSession(sessions: PlexSession[], username: string): PlexSession | null {
  const own = sessions.filter((s) => s.User.title === username);
  for (const state of STATE_PRIORITY) {
    const match = own.find((s) => s.Player.state === state);
    if (match) return match;
  }
  return null;
}

/**
 * Remote state source talking to a Plex Media Server. Sessions are polled
 * over HTTP; the notification websocket only tells us *that* something
 * changed, never what.
 */
export class PlexClient implements RemoteStateSource {
  private readonly sleep: Sleep;

  constructor(private readonly options: PlexClientOptions) {
    this.sleep = options.sleep ?? defaultSleep;
  }

  private headers(): Record<string, string> {
    return {
      "X-Plex-Token": this.options.token,
      "X-Plex-Client-Identifier": this.options.clientIdentifier,
      "X-Plex-Product": PRODUCT,
      "X-Plex-Version": VERSION,
      Accept: "application/json",
    };
  }

  private async sendWithRetry(url: string): Promise<Response> {
    for (let retries = 0; ; retries++) {
      try {
        const response = await fetch(url, {
          headers: this.headers(),
          signal: AbortSignal.timeout(REQUEST_TIMEOUT_MS),
        });
        if (response.status < 500 || retries >= MAX_RETRIES) {
          return response;
        }
        log.debug(`Plex answered ${response.status}, retrying (${retries + 1}/${MAX_RETRIES})`);
      } catch (error) {
        if (retries >= MAX_RETRIES) {
          throw new FetchError(`Could not reach Plex: ${errorMessage(error)}`, { cause: error });
        }
        log.debug(`Plex request failed (${errorMessage(error)}), retrying (${retries + 1}/${MAX_RETRIES})`);
      }
      await this.sleep(RETRY_DELAY_MS * (retries + 1));
    }
  }

  private async getJson<T>(url: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, what: string): Promise<T> {
    const response = await this.sendWithRetry(url);

    if (response.status === 401 || response.status === 403) {
      throw new FetchError(`Plex rejected the token while fetching ${what}`, {
        status: response.status,
        unauthorized: true,
      });
    }
    if (!response.ok) {
      throw new FetchError(`Failed to get ${what}: ${response.status} ${response.statusText}`, {
        status: response.status,
      });
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new FetchError(`Plex returned invalid JSON for ${what}`, { cause: error });
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      throw new FetchError(`Unexpected ${what} payload: ${parsed.error.issues[0]?.message ?? "invalid"}`, {
        cause: parsed.error,
      });
    }
    return parsed.data;
  }

  async fetchSession(target: ConnectionTarget): Promise<PlaybackSession | null> {
    const url = `http://${target.address}:${target.port}/status/sessions`;
    const data = await this.getJson(url, SessionsResponseSchema, "sessions");
    const session = pickUserSession(data.MediaContainer.Metadata, this.options.username);
    return session ? toPlaybackSession(target, session) : null;
  }

  openNotifications(target: ConnectionTarget): Promise<PushChannel> {
    const url =
      `ws://${target.address}:${target.port}/:/websockets/notifications` +
      `?X-Plex-Token=${encodeURIComponent(this.options.token)}`;

    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, { handshakeTimeout: REQUEST_TIMEOUT_MS });
      const queue = new SignalQueue(() => socket.close());
      let opened = false;

      socket.on("open", () => {
        opened = true;
        resolve(queue);
      });

      socket.on("message", () => {
        queue.push();
      });

      socket.on("error", (error) => {
        queue.end();
        if (!opened) {
          reject(new PushChannelError(`WebSocket connection failed: ${error.message}`, { cause: error }));
        }
      });

      socket.on("close", () => {
        queue.end();
        if (!opened) {
          reject(new PushChannelError("WebSocket closed before it opened"));
        }
      });
    });
  }

  async listServers(): Promise<PlexServer[]> {
    const url = `${PLEX_TV_API}/resources?includeHttps=1&includeRelay=1`;
    const resources = await this.getJson(url, ResourcesResponseSchema, "servers");

    const servers: PlexServer[] = [];
    for (const resource of resources) {
      if (resource.provides && !resource.provides.split(",").includes("server")) continue;
      const connection = resource.connections.find((c) => c.local) ?? resource.connections[0];
      if (!connection) continue;
      servers.push({
        name: resource.name,
        address: connection.address,
        port: connection.port,
        owned: resource.owned,
      });
    }
    return servers;
  }
}
