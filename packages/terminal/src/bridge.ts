/**
 * Terminal bridge between the local TTY and a container pseudo-terminal.
 *
 * Remote output goes to local output unmodified. Local input is copied to
 * the recorder first, then sent to the remote. The remote closing its
 * stream ends the session.
 *
 * Whatever ends the session, begin() detaches the remote, restores the
 * saved terminal mode and drops the resize listener before returning.
 */

import { createLogger, describeError } from "@agentpod/core";
import { InterruptedError } from "./errors.js";
import { processTerminal } from "./local-terminal.js";
import { acquireRawMode } from "./raw-mode.js";
import type {
  BridgeOptions,
  InputRecorder,
  LocalTerminal,
  RemoteStream,
  TerminalSize,
} from "./types.js";

const logger = createLogger("terminal");

/** Largest slice of remote output written at once */
export const REMOTE_CHUNK_SIZE = 8192;

/** Largest slice of local input recorded and forwarded at once */
export const LOCAL_CHUNK_SIZE = 1024;

/** Size reported when the local output is not a terminal */
export const FALLBACK_SIZE: TerminalSize = { columns: 120, rows: 40 };

type Cleanup = readonly [label: string, run: () => void | Promise<void>];

type RelayOutcome = { ok: true } | { ok: false; error: unknown };

interface Relay {
  /** Settles once, never rejects */
  readonly outcome: Promise<RelayOutcome>;
  settled(): boolean;
  /** Begin forwarding local input to the remote */
  startInput(): void;
  /** End the relay cleanly if it is still running */
  stop(): void;
}

function toBuffer(chunk: Buffer | string): Buffer {
  return typeof chunk === "string" ? Buffer.from(chunk) : chunk;
}

function* slices(data: Buffer, size: number): Generator<Buffer> {
  for (let offset = 0; offset < data.length; offset += size) {
    yield data.subarray(offset, offset + size);
  }
}

export class TerminalBridge {
  private readonly terminal: LocalTerminal;

  constructor(terminal: LocalTerminal = processTerminal()) {
    this.terminal = terminal;
  }

  /**
   * Relay until the remote stream closes.
   * Rejects with the stream error, the recorder error, or an
   * InterruptedError when options.signal aborts.
   */
  async begin(
    remote: RemoteStream,
    recorder?: InputRecorder | null,
    options: BridgeOptions = {}
  ): Promise<void> {
    // Listen on the remote before the first await: it may end or fail
    // while the initial resize is in flight.
    const relay = this.startRelay(remote, recorder ?? null, options.signal);
    const cleanups: Cleanup[] = [
      ["detach remote", () => remote.close()],
      ["stop relay", () => relay.stop()],
    ];

    try {
      await this.syncSize(remote);

      if (this.terminal.interactive && !relay.settled()) {
        const lease = acquireRawMode(this.terminal);
        cleanups.push(["restore terminal mode", () => lease.release()]);

        const detachResize = this.terminal.onResize(() => {
          void this.syncSize(remote);
        });
        cleanups.push(["remove resize listener", detachResize]);

        relay.startInput();
      }

      const outcome = await relay.outcome;
      if (!outcome.ok) {
        throw outcome.error;
      }
    } finally {
      for (const [label, run] of cleanups.reverse()) {
        try {
          await run();
        } catch (error) {
          logger.debug(`Failed to ${label}: ${describeError(error)}`);
        }
      }
    }
  }

  /** Push the local size to the remote. Never rejects. */
  private async syncSize(remote: RemoteStream): Promise<void> {
    const size = this.terminal.size() ?? FALLBACK_SIZE;
    try {
      await remote.resize(size);
    } catch (error) {
      logger.debug(
        `Resize to ${size.columns}x${size.rows} failed: ${describeError(error)}`
      );
    }
  }

  private startRelay(
    remote: RemoteStream,
    recorder: InputRecorder | null,
    signal: AbortSignal | undefined
  ): Relay {
    const { stream } = remote;
    const { input, output } = this.terminal;

    let settled = false;
    let reading = false;
    let resolveOutcome: ((outcome: RelayOutcome) => void) | undefined;
    const outcome = new Promise<RelayOutcome>((resolve) => {
      resolveOutcome = resolve;
    });

    const finish = (result: RelayOutcome): void => {
      if (settled) return;
      settled = true;

      stream.off("data", onRemoteData);
      stream.off("end", onRemoteEnd);
      stream.off("close", onRemoteEnd);
      signal?.removeEventListener("abort", onAbort);
      if (reading) {
        input.off("data", onLocalData);
        input.off("error", onInputError);
        input.pause();
      }

      resolveOutcome?.(result);
    };

    const fail = (error: unknown): void => {
      finish({ ok: false, error });
    };

    const onRemoteData = (chunk: Buffer | string): void => {
      const data = toBuffer(chunk);
      if (data.length === 0) {
        finish({ ok: true });
        return;
      }
      for (const part of slices(data, REMOTE_CHUNK_SIZE)) {
        output.write(part);
      }
    };

    const onRemoteEnd = (): void => {
      logger.debug("Remote stream closed");
      finish({ ok: true });
    };

    const onLocalData = (chunk: Buffer | string): void => {
      for (const part of slices(toBuffer(chunk), LOCAL_CHUNK_SIZE)) {
        try {
          recorder?.record(part);
        } catch (error) {
          fail(error);
          return;
        }
        stream.write(part);
      }
    };

    // Stays attached after settle so a late socket error is not uncaught
    const onStreamError = (error: Error): void => {
      if (settled) {
        logger.debug(`Stream error after session end: ${error.message}`);
        return;
      }
      fail(error);
    };

    const onInputError = (error: Error): void => {
      fail(error);
    };

    const onAbort = (): void => {
      fail(new InterruptedError());
    };

    stream.on("error", onStreamError);
    stream.on("end", onRemoteEnd);
    stream.on("close", onRemoteEnd);
    stream.on("data", onRemoteData);
    signal?.addEventListener("abort", onAbort, { once: true });

    if (stream.errored) {
      fail(stream.errored);
    } else if (stream.destroyed || stream.readableEnded) {
      logger.debug("Remote stream already closed");
      finish({ ok: true });
    } else if (signal?.aborted) {
      fail(new InterruptedError());
    }

    return {
      outcome,
      settled: () => settled,
      startInput: () => {
        if (settled || reading) return;
        reading = true;
        input.on("error", onInputError);
        input.on("data", onLocalData);
        input.resume();
      },
      stop: () => {
        finish({ ok: true });
      },
    };
  }
}
