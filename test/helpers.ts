import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

import type { ScheduledTask, Scheduler } from "../src/coordinator/types.js";

export function fixturePath(name: string): string {
  return fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));
}

export function loadFixture(name: string): unknown {
  return JSON.parse(readFileSync(fixturePath(name), "utf8"));
}

export function jsonResponse(body: unknown, init: ResponseInit = {}): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { "content-type": "application/json" },
    ...init
  });
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (error: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

interface PendingTask {
  at: number;
  delayMs: number;
  callback: () => void;
  cancelled: boolean;
}

/** Scheduler driven by `advance()` instead of real timers. */
export class ManualScheduler implements Scheduler {
  private currentMs: number;
  private readonly tasks: PendingTask[] = [];

  constructor(start: Date) {
    this.currentMs = start.getTime();
  }

  now(): Date {
    return new Date(this.currentMs);
  }

  schedule(callback: () => void, delayMs: number): ScheduledTask {
    const task: PendingTask = { at: this.currentMs + delayMs, delayMs, callback, cancelled: false };
    this.tasks.push(task);
    return {
      cancel() {
        task.cancelled = true;
      }
    };
  }

  /** Delays of the tasks that are still waiting to run. */
  pendingDelays(): number[] {
    return this.tasks.filter((task) => !task.cancelled).map((task) => task.delayMs);
  }

  advance(ms: number): void {
    this.currentMs += ms;
    const due = this.tasks
      .filter((task) => !task.cancelled && task.at <= this.currentMs)
      .sort((left, right) => left.at - right.at);
    for (const task of due) {
      task.cancelled = true;
      task.callback();
    }
  }
}

/** Lets pending promise callbacks run. */
export async function flushPromises(): Promise<void> {
  for (let index = 0; index < 5; index += 1) {
    await new Promise<void>((resolve) => {
      setImmediate(resolve);
    });
  }
}

export class FakeRedisClient {
  readonly hashes = new Map<string, Record<string, string>>();
  readonly ttls = new Map<string, number>();

  async hSet(key: string, fields: Record<string, string>): Promise<number> {
    const existing = this.hashes.get(key) ?? {};
    const added = Object.keys(fields).filter((field) => !(field in existing)).length;
    this.hashes.set(key, { ...existing, ...fields });
    return added;
  }

  async hGetAll(key: string): Promise<Record<string, string>> {
    return { ...(this.hashes.get(key) ?? {}) };
  }

  async expire(key: string, seconds: number): Promise<boolean> {
    if (!this.hashes.has(key)) {
      return false;
    }
    this.ttls.set(key, seconds);
    return true;
  }
}
