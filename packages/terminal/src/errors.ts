/** Another bridge already holds the local terminal in raw mode */
export class TerminalBusyError extends Error {
  constructor() {
    super("Local terminal is already attached to another session");
    this.name = "TerminalBusyError";
  }
}

/** The session was aborted locally, e.g. by SIGINT or SIGTERM */
export class InterruptedError extends Error {
  constructor(message = "Session interrupted") {
    super(message);
    this.name = "InterruptedError";
  }
}
