/**
 * Database module exports.
 */

export {
  openDatabase,
  openExistingDatabase,
  openMemoryDatabase,
} from "./connection.js";
export { runMigrations, getDefaultMigrationsDir } from "./migrations.js";
export {
  generateSessionId,
  createSession,
  endSession,
  getSessionById,
  listSessions,
  type ListSessionsOptions,
} from "./sessions.js";
export {
  insertMessage,
  getMessagesBySession,
  countMessagesBySession,
} from "./messages.js";
