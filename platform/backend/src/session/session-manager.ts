import { randomUUID } from "node:crypto";
import config from "@/config";
import logger from "@/logging";
import type { Store } from "@/models";
import type {
  AddSessionMessageResult,
  GeneratedPrompt,
  Message,
  MessageRole,
  PromptDocument,
  SessionState,
} from "@/types";

const ROLE_LABELS: Record<MessageRole, string> = {
  user: "User",
  assistant: "Assistant",
};

export function createSessionState(sessionId?: string): SessionState {
  return {
    sessionId: sessionId ?? randomUUID().slice(0, 8),
    conversationId: null,
  };
}

/**
 * Render messages as the transcript the agent reads as conversation memory:
 * one `User: ...` or `Assistant: ...` line per message, oldest first.
 */
export function formatTranscript(messages: Message[]): string {
  return messages
    .map((message) => `${ROLE_LABELS[message.role]}: ${message.content}`)
    .join("\n");
}

/**
 * Keeps each session writing to a single active conversation.
 *
 * The manager holds no per-session state itself: every operation takes the
 * caller's SessionState and returns the state to use next. Conversation
 * transitions happen only here (or through the store's create, which
 * completes stale active rows).
 */
export class SessionManager {
  constructor(
    private readonly store: Store,
    private readonly contextLimit: number = config.session.contextLimit,
  ) {}

  /**
   * Make sure `state` points at a conversation. A tracked conversation is
   * kept as is; otherwise the session's active conversation is adopted, or a
   * new one is created.
   */
  async ensureConversation(state: SessionState): Promise<SessionState> {
    const resolved = await this.resolveConversation(state);
    return resolved.state;
  }

  private async resolveConversation(
    state: SessionState,
  ): Promise<{ state: SessionState; conversationId: number }> {
    if (state.conversationId !== null) {
      return { state, conversationId: state.conversationId };
    }

    const active = await this.store.conversations.findActiveBySessionId(
      state.sessionId,
    );
    if (active) {
      logger.debug(
        { sessionId: state.sessionId, conversationId: active.id },
        "[SessionManager] Resumed active conversation",
      );
      return {
        state: { ...state, conversationId: active.id },
        conversationId: active.id,
      };
    }

    const created = await this.store.conversations.create(state.sessionId);
    logger.info(
      { sessionId: state.sessionId, conversationId: created.id },
      "[SessionManager] Started conversation",
    );
    return {
      state: { ...state, conversationId: created.id },
      conversationId: created.id,
    };
  }

  /**
   * End the tracked conversation (if any) and start a fresh one for the same
   * session.
   */
  async newConversation(
    state: SessionState,
    agentName?: string,
  ): Promise<SessionState> {
    if (state.conversationId !== null) {
      await this.store.conversations.end(state.conversationId);
    }

    const created = await this.store.conversations.create(
      state.sessionId,
      agentName,
    );
    logger.info(
      {
        sessionId: state.sessionId,
        previousConversationId: state.conversationId,
        conversationId: created.id,
      },
      "[SessionManager] Started new conversation",
    );
    return { ...state, conversationId: created.id };
  }

  async addMessage(
    state: SessionState,
    role: MessageRole,
    content: string,
  ): Promise<AddSessionMessageResult> {
    const resolved = await this.resolveConversation(state);
    const message = await this.store.messages.create(
      resolved.conversationId,
      role,
      content,
    );
    return { state: resolved.state, message };
  }

  async getMessages(state: SessionState, limit?: number): Promise<Message[]> {
    if (state.conversationId === null) {
      return [];
    }
    return this.store.messages.findByConversationId(
      state.conversationId,
      limit,
    );
  }

  /**
   * Transcript of the first `limit` messages of the tracked conversation,
   * or "" when there are none.
   */
  async getContextTranscript(
    state: SessionState,
    limit: number = this.contextLimit,
  ): Promise<string> {
    const messages = await this.getMessages(state, limit);
    return formatTranscript(messages);
  }

  async listReferenceDocuments(category?: string): Promise<PromptDocument[]> {
    return this.store.documents.findAll({ category });
  }

  async getReferenceContent(name: string): Promise<string | null> {
    return this.store.documents.readContent(name);
  }

  /**
   * Save a generated prompt, linked to the tracked conversation when there
   * is one.
   */
  async saveGeneratedPrompt(
    state: SessionState,
    prompt: { name: string; content: string; metadata?: string },
  ): Promise<GeneratedPrompt> {
    return this.store.generatedPrompts.create({
      ...prompt,
      conversationId: state.conversationId,
    });
  }
}
