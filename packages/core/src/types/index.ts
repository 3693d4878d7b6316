export type {
  ExitReason,
  SessionMetadata,
  Session,
  Message,
} from "./session.js";
