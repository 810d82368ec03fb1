import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import logger from "@/logging";
import type { Store } from "@/models";
import type { SessionManager } from "@/session";
import type { PromptDocument, SessionState } from "@/types";

/** Sends one prompt to the external agent and resolves with its reply */
export type RespondFn = (prompt: string) => Promise<string>;

export interface BuilderState {
  session: SessionState;
  /** Repository being analysed by /improve, if any */
  improveTargetPath: string | null;
}

export type CommandResult =
  | { type: "reply"; text: string; state: BuilderState }
  | { type: "improve"; targetPath: string; state: BuilderState }
  | { type: "quit" }
  /** Not a built-in command; the input goes to the agent unchanged */
  | { type: "passthrough" };

export interface ChatTurnResult {
  state: BuilderState;
  reply: string;
}

export const HELP_TEXT = `Available Commands:
  /new             - Start a new prompt from scratch
  /improve [path]  - Improve an existing prompt by analyzing a repository
  /list            - List available reference prompts
  /view [name]     - View content of a reference prompt
  /draft           - Ask the agent to generate a draft prompt
  /save [name]     - Save the agent's last reply as a generated prompt
  /history         - Show conversation history
  /quit            - Exit the application

Examples:
  /improve ~/projects/my-agent
  /view support-agent`;

const HISTORY_PREVIEW_LENGTH = 100;

export function createBuilderState(session: SessionState): BuilderState {
  return { session, improveTargetPath: null };
}

function parseCommand(input: string): { command: string; arg: string | null } {
  const trimmed = input.trim();
  const spaceIndex = trimmed.search(/\s/);
  if (spaceIndex === -1) {
    return { command: trimmed.toLowerCase(), arg: null };
  }
  return {
    command: trimmed.slice(0, spaceIndex).toLowerCase(),
    arg: trimmed.slice(spaceIndex).trim() || null,
  };
}

function expandHome(target: string): string {
  if (target === "~" || target.startsWith(`~${path.sep}`)) {
    return path.join(os.homedir(), target.slice(1));
  }
  return target;
}

export function formatDocumentList(documents: PromptDocument[]): string {
  if (documents.length === 0) {
    return "No reference prompts in database. Use the seed script to add some.";
  }

  const lines = ["Reference Prompts:"];
  for (const document of documents) {
    lines.push(
      document.category
        ? `  - ${document.name} [${document.category}]`
        : `  - ${document.name}`,
    );
    if (document.description) {
      lines.push(`      ${document.description}`);
    }
  }
  return lines.join("\n");
}

/**
 * The message sent on the user's behalf right after /improve.
 */
export function buildImproveRequest(targetPath: string): string {
  return `I want to improve the system prompt for the agent at ${targetPath}. Please explore the repository to understand the existing prompt, database schema, tools, and integrations. Then ask me which aspects I want to improve.`;
}

function buildImproveContext(targetPath: string): string {
  return `
=== IMPROVE MODE ACTIVE ===
Target repository: ${targetPath}
Explore this repository to find:
- The existing system prompt (prompts/, .claude/, or the repository root)
- The database schema (.db files, models, schema.sql)
- Available tools (tools/, functions, API handlers)
- Integrations (API clients, config files)
Then ask the user what they want to improve.
===========================
`;
}

/**
 * Handles the builder's slash commands and chat turns for one session.
 */
export class PromptBuilder {
  constructor(
    private readonly store: Store,
    private readonly sessions: SessionManager,
  ) {}

  async handleCommand(
    state: BuilderState,
    input: string,
  ): Promise<CommandResult> {
    const { command, arg } = parseCommand(input);

    switch (command) {
      case "/help":
        return { type: "reply", text: HELP_TEXT, state };

      case "/list": {
        const documents = await this.sessions.listReferenceDocuments();
        return { type: "reply", text: formatDocumentList(documents), state };
      }

      case "/view":
        return {
          type: "reply",
          text: arg ? await this.viewDocument(arg) : "Usage: /view [prompt_name]",
          state,
        };

      case "/new": {
        const session = await this.sessions.newConversation(state.session);
        return {
          type: "reply",
          text: "Started new conversation. What kind of agent would you like to build?",
          state: { session, improveTargetPath: null },
        };
      }

      case "/improve":
        return this.startImprove(state, arg);

      case "/save":
        return this.saveLastReply(state, arg);

      case "/history": {
        const session = await this.sessions.ensureConversation(state.session);
        const resumed = { ...state, session };
        return {
          type: "reply",
          text: await this.formatHistory(resumed),
          state: resumed,
        };
      }

      case "/quit":
      case "/exit":
        return { type: "quit" };

      default:
        return { type: "passthrough" };
    }
  }

  /**
   * One exchange with the agent. The user message is stored before the agent
   * is called, so it stays recorded when `respond` rejects. A state without
   * a tracked conversation resumes the session's active one first.
   */
  async runChatTurn(
    current: BuilderState,
    userInput: string,
    respond: RespondFn,
  ): Promise<ChatTurnResult> {
    const state: BuilderState = {
      ...current,
      session: await this.sessions.ensureConversation(current.session),
    };
    const history = await this.sessions.getContextTranscript(state.session);
    const documents = await this.sessions.listReferenceDocuments();
    const promptList =
      documents.length > 0
        ? documents.map((document) => document.name).join(", ")
        : "none available";
    const improveContext = state.improveTargetPath
      ? buildImproveContext(state.improveTargetPath)
      : "";

    const fullPrompt = `Available reference prompts in database: ${promptList}
${improveContext}
Previous conversation:
${history}

User: ${userInput}`;

    const recorded = await this.sessions.addMessage(
      state.session,
      "user",
      userInput,
    );

    const reply = await respond(fullPrompt);

    const answered = await this.sessions.addMessage(
      recorded.state,
      "assistant",
      reply,
    );

    return {
      state: { ...state, session: answered.state },
      reply,
    };
  }

  private async viewDocument(name: string): Promise<string> {
    const content = await this.sessions.getReferenceContent(name);
    if (content !== null) {
      return `=== ${name} ===\n${content}`;
    }

    const document = await this.store.documents.findByName(name);
    if (document) {
      return `Found '${name}' but cannot read content. Path: ${document.localPath}`;
    }
    return `Prompt '${name}' not found. Use /list to see available prompts.`;
  }

  private async startImprove(
    state: BuilderState,
    arg: string | null,
  ): Promise<CommandResult> {
    if (!arg) {
      return {
        type: "reply",
        text: "Usage: /improve [path_to_repo]\nExample: /improve ~/projects/my-agent",
        state,
      };
    }

    const targetPath = path.resolve(expandHome(arg));
    const stats = await fs.stat(targetPath).catch((error: unknown) => {
      logger.debug(
        { targetPath, error },
        "[PromptBuilder] Improve target not accessible",
      );
      return null;
    });
    if (!stats) {
      return { type: "reply", text: `Path does not exist: ${targetPath}`, state };
    }
    if (!stats.isDirectory()) {
      return {
        type: "reply",
        text: `Path is not a directory: ${targetPath}`,
        state,
      };
    }

    const session = await this.sessions.newConversation(state.session);
    return {
      type: "improve",
      targetPath,
      state: { session, improveTargetPath: targetPath },
    };
  }

  private async saveLastReply(
    state: BuilderState,
    name: string | null,
  ): Promise<CommandResult> {
    if (!name) {
      return { type: "reply", text: "Usage: /save [name]", state };
    }

    const session = await this.sessions.ensureConversation(state.session);
    const messages = await this.sessions.getMessages(session);
    const lastReply = messages
      .filter((message) => message.role === "assistant")
      .at(-1);
    if (!lastReply) {
      return {
        type: "reply",
        text: "Nothing to save yet: the agent has not replied in this conversation.",
        state,
      };
    }

    const saved = await this.sessions.saveGeneratedPrompt(session, {
      name,
      content: lastReply.content,
    });
    return {
      type: "reply",
      text: `Saved generated prompt '${name}' (#${saved.id}).`,
      state: { ...state, session },
    };
  }

  private async formatHistory(state: BuilderState): Promise<string> {
    const messages = await this.sessions.getMessages(state.session);
    if (messages.length === 0) {
      return "No messages in current conversation.";
    }

    const lines = ["Conversation History:"];
    for (const message of messages) {
      const speaker = message.role === "user" ? "You" : "Agent";
      const preview =
        message.content.length > HISTORY_PREVIEW_LENGTH
          ? `${message.content.slice(0, HISTORY_PREVIEW_LENGTH)}...`
          : message.content;
      lines.push(`  [${speaker}] ${preview}`);
    }
    return lines.join("\n");
  }
}
