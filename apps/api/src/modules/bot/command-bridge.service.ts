import { Injectable, Logger } from "@nestjs/common";
import type { OnModuleDestroy, OnModuleInit } from "@nestjs/common";

import { BridgeTimeoutError, errorMessage } from "../common/errors";
import type { Deferred } from "../common/interruptible";
import { createDeferred } from "../common/interruptible";

export const BRIDGE_TIMEOUT_MS = 10_000;
export const BRIDGE_TIMEOUT_MESSAGE = "Async operation timed out";

export type BridgeOutcome<T> =
  | { status: "ok"; httpStatus: 200; payload: T }
  | { status: "timeout"; httpStatus: 504; payload: { error: string } }
  | { status: "failed"; httpStatus: 500; payload: { error: string } };

type Settled<T> = { ok: true; value: T } | { ok: false; error: unknown };

type BridgeRequest = {
  label: string;
  run: () => Promise<void>;
  abandon: (reason: string) => void;
};

/**
 * Hands work from request handlers to the dispatcher that owns bot state. The dispatcher runs for
 * the whole process lifetime, whether or not the bot itself is running. A caller waits at most
 * `timeoutMs`; work that outlives the wait keeps running and its completion is only logged.
 */
@Injectable()
export class CommandBridgeService implements OnModuleInit, OnModuleDestroy {
  private readonly logger = new Logger(CommandBridgeService.name);
  private readonly queue: BridgeRequest[] = [];
  private readonly running = new Set<Promise<void>>();
  private readonly controller = new AbortController();
  private wake: Deferred<void> | null = null;
  private pumpDone: Promise<void> | null = null;

  onModuleInit(): void {
    if (this.pumpDone) return;
    this.pumpDone = this.pump(this.controller.signal);
  }

  async onModuleDestroy(): Promise<void> {
    this.controller.abort();
    this.wake?.resolve();
    await this.pumpDone;
    await Promise.all([...this.running]);
  }

  async submit<T>(label: string, work: () => T | Promise<T>, options?: { timeoutMs?: number }): Promise<BridgeOutcome<T>> {
    if (this.controller.signal.aborted) {
      return { status: "failed", httpStatus: 500, payload: { error: "Command bridge is shut down" } };
    }

    const timeoutMs = options?.timeoutMs ?? BRIDGE_TIMEOUT_MS;
    const settled = createDeferred<Settled<T>>();
    let timedOut = false;

    this.queue.push({
      label,
      run: async () => {
        let result: Settled<T>;
        try {
          result = { ok: true, value: await work() };
        } catch (error) {
          result = { ok: false, error };
        }
        if (timedOut) this.logLateCompletion(label, result);
        settled.resolve(result);
      },
      abandon: (reason) => settled.resolve({ ok: false, error: new Error(reason) })
    });
    this.wake?.resolve();

    let timer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<"timeout">((resolve) => {
      timer = setTimeout(() => resolve("timeout"), timeoutMs);
    });
    const winner = await Promise.race([settled.promise, deadline]);
    clearTimeout(timer);

    if (winner === "timeout") {
      timedOut = true;
      this.logger.warn(`${label}: ${new BridgeTimeoutError(timeoutMs).message}`);
      return { status: "timeout", httpStatus: 504, payload: { error: BRIDGE_TIMEOUT_MESSAGE } };
    }
    if (winner.ok) {
      return { status: "ok", httpStatus: 200, payload: winner.value };
    }
    this.logger.error(`${label} failed: ${errorMessage(winner.error)}`);
    return { status: "failed", httpStatus: 500, payload: { error: errorMessage(winner.error) } };
  }

  private async pump(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      const next = this.queue.shift();
      if (!next) {
        this.wake = createDeferred<void>();
        await this.wake.promise;
        this.wake = null;
        continue;
      }
      this.dispatch(next);
    }

    for (const request of this.queue.splice(0)) {
      this.logger.warn(`Dropping ${request.label}: command bridge is shutting down`);
      request.abandon("Command bridge is shut down");
    }
  }

  private dispatch(request: BridgeRequest): void {
    const done = request.run();
    this.running.add(done);
    void done.finally(() => this.running.delete(done));
  }

  private logLateCompletion<T>(label: string, result: Settled<T>): void {
    if (result.ok) {
      this.logger.warn(`${label} completed after its caller timed out`);
    } else {
      this.logger.warn(`${label} failed after its caller timed out: ${errorMessage(result.error)}`);
    }
  }
}
