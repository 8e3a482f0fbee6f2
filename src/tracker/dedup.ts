import type { NotificationState } from "./types";

export function createNotificationState(): NotificationState {
  return { lastMessage: null };
}

/**
 * True unless the candidate is exactly the message sent last.
 */
export function shouldSend(
  candidate: string,
  state: Readonly<NotificationState>,
): boolean {
  return candidate !== state.lastMessage;
}

/**
 * Call only after a send succeeded; a failed send leaves the state alone so
 * the same message goes out again next cycle.
 */
export function recordSent(candidate: string, state: NotificationState): void {
  state.lastMessage = candidate;
}

export function resetNotificationState(state: NotificationState): void {
  state.lastMessage = null;
}
