/**
 * Sessions commands - read recorded transcripts from the local store.
 */

import {
  EXIT,
  countMessagesBySession,
  getMessagesBySession,
  getSessionById,
  isAgentKind,
  listSessions,
  openExistingDatabase,
  type Session,
} from "@agentpod/core";
import { CommandError, UsageError, type CommandContext } from "../context.js";
import { formatTable, toJson } from "../format.js";

export interface SessionsListOptions {
  agent?: string | undefined;
  limit?: string | undefined;
  json?: boolean | undefined;
}

type Store = NonNullable<ReturnType<typeof openExistingDatabase>>;

interface SessionWithCount extends Session {
  messageCount: number;
}

export function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new UsageError(`Invalid --limit '${value}', expected a positive integer`);
  }
  return limit;
}

function withStore<T>(
  context: CommandContext,
  read: (db: Store) => T
): T | null {
  const db = openExistingDatabase(context.config.logging.dbPath);
  if (!db) {
    return null;
  }
  try {
    return read(db);
  } finally {
    db.close();
  }
}

function sessionStatus(session: Session): string {
  return session.exitReason ?? "active";
}

export async function sessionsListCommand(
  context: CommandContext,
  options: SessionsListOptions = {}
): Promise<void> {
  const { output } = context;
  if (options.agent !== undefined && !isAgentKind(options.agent)) {
    throw new UsageError(`Unknown agent '${options.agent}'`);
  }
  const limit = parseLimit(options.limit);

  const sessions =
    withStore(context, (db) =>
      listSessions(db, { agent: options.agent, limit }).map(
        (session): SessionWithCount => ({
          ...session,
          messageCount: countMessagesBySession(db, session.id),
        })
      )
    ) ?? [];

  if (options.json) {
    output.print(toJson(sessions));
    return;
  }
  if (sessions.length === 0) {
    output.print("No sessions found.");
    return;
  }

  output.print(
    formatTable<SessionWithCount>(
      [
        { header: "ID", width: 34, value: (s) => s.id },
        { header: "AGENT", width: 10, value: (s) => s.agent },
        { header: "STARTED", width: 26, value: (s) => s.startedAt },
        { header: "STATUS", width: 20, value: sessionStatus },
        { header: "MESSAGES", width: 8, value: (s) => String(s.messageCount) },
      ],
      sessions
    )
  );
}

export async function sessionsShowCommand(
  context: CommandContext,
  id: string,
  options: { json?: boolean | undefined } = {}
): Promise<void> {
  const found = withStore(context, (db) => {
    const session = getSessionById(db, id);
    return session ? { session, messages: getMessagesBySession(db, id) } : null;
  });
  if (!found) {
    throw new CommandError(`Session not found: ${id}`, EXIT.ERROR);
  }

  const { session, messages } = found;
  if (options.json) {
    context.output.print(toJson(found));
    return;
  }

  const lines = [
    "Session Details",
    "===============",
    `ID:         ${session.id}`,
    `Agent:      ${session.agent}`,
    `Image:      ${session.image}`,
    `Workspace:  ${session.workspace}`,
    `Container:  ${session.containerName} (${session.containerId.slice(0, 12)})`,
    `Started:    ${session.startedAt}`,
    `Ended:      ${session.endedAt ?? "N/A"}`,
    `Exit:       ${sessionStatus(session)}`,
    `Version:    ${session.version}`,
    `Messages:   ${messages.length}`,
  ];
  if (messages.length > 0) {
    lines.push("");
    for (const message of messages) {
      lines.push(`[${message.timestamp}] ${message.content}`);
    }
  }
  context.output.print(lines.join("\n"));
}
