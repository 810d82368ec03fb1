export {
  type BuilderState,
  buildImproveRequest,
  type ChatTurnResult,
  type CommandResult,
  createBuilderState,
  formatDocumentList,
  HELP_TEXT,
  PromptBuilder,
  type RespondFn,
} from "./prompt-builder";
