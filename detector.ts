import type { PlaybackSession } from "./types";
import type { ChangeOutcome } from "./tracker";

export const STATUS_NO_SESSION = "No active session";
export const STATUS_WAITING_IDLE = "Waiting for idle debounce...";
export const STATUS_NOT_AUTHENTICATED = "Not authenticated";
export const STATUS_NO_SERVER = "No server selected";

export type PresenceAction =
  | { kind: "publish"; session: PlaybackSession }
  | { kind: "clear" }
  | { kind: "none" };

/** An idle player is the same as nothing playing; it never becomes presence. */
export function activeSession(fetched: PlaybackSession | null): PlaybackSession | null {
  if (!fetched || fetched.playerState === "idle") return null;
  return fetched;
}

export function statusFor(session: PlaybackSession): string {
  switch (session.playerState) {
    case "paused":
      return `Paused: ${session.title}`;
    case "buffering":
      return `Buffering: ${session.title}`;
    default:
      return `Playing: ${session.title}`;
  }
}

export function describeOutcome(outcome: ChangeOutcome): string {
  switch (outcome.kind) {
    case "changed":
    case "unchanged":
      return statusFor(outcome.session);
    case "waiting-idle":
      return STATUS_WAITING_IDLE;
    case "became-idle":
    case "none":
      return STATUS_NO_SESSION;
  }
}

/**
 * `pendingPublish` is set when an earlier publish failed, so an otherwise
 * unchanged session still gets pushed to Discord.
 */
export function actionFor(outcome: ChangeOutcome, pendingPublish: boolean): PresenceAction {
  switch (outcome.kind) {
    case "changed":
      return { kind: "publish", session: outcome.session };
    case "unchanged":
      return pendingPublish ? { kind: "publish", session: outcome.session } : { kind: "none" };
    case "became-idle":
      return { kind: "clear" };
    default:
      return { kind: "none" };
  }
}
