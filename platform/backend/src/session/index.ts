export {
  createSessionState,
  formatTranscript,
  SessionManager,
} from "./session-manager";
