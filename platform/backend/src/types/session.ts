/* SPDX-License-Identifier: MIT */
import type { Message } from "./message";

/**
 * Which conversation a session is currently writing to. Returned from every
 * session operation; callers keep the latest value and pass it back in.
 */
export interface SessionState {
  sessionId: string;
  /** null until a conversation has been adopted or created */
  conversationId: number | null;
}

export interface AddSessionMessageResult {
  state: SessionState;
  message: Message;
}
