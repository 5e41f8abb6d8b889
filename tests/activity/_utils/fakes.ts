/**
 * In-process stand-ins for the activity engine's collaborators.
 */
import { vi } from "vitest";
import { ActivityError } from "@/modules/activity/errors";
import type {
  ActivityLogger,
  EditOutcome,
  EntityDirectory,
  HistoricalMessage,
  MessageHistory,
  PublishTarget,
  TrackedEntity,
  UnixSeconds,
} from "@/modules/activity/types";
import { ErrResult, OkResult, type Result } from "@/utils/result";
import { millisToSnowflake } from "@/utils/snowflake";

export const NOW: UnixSeconds = 1_700_000_000;
export const DAY = 86_400;

export const fixedClock = (now: UnixSeconds = NOW) => () => now;

export const createLogger = () => {
  const logger = {
    debug: vi.fn(),
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
  } satisfies ActivityLogger;
  return logger;
};

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (reason: unknown) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Snowflake created at `unixSeconds`, with `seq` in the low bits to keep ids unique. */
export const snowflakeAt = (unixSeconds: UnixSeconds, seq = 0): string =>
  (BigInt(millisToSnowflake(unixSeconds * 1000)) + BigInt(seq)).toString();

export const entity = (id: string, createdAt = new Date(0), name: string | null = null): TrackedEntity => ({
  id,
  name,
  createdAt,
});

export class FakeDirectory implements EntityDirectory {
  readonly categories = new Map<string, TrackedEntity[]>();
  readonly parents = new Map<string, string>();
  readonly failingCategories = new Set<string>();
  resolveError: Error | null = null;

  addChannel(categoryId: string, channel: TrackedEntity): this {
    const list = this.categories.get(categoryId) ?? [];
    list.push(channel);
    this.categories.set(categoryId, list);
    this.parents.set(channel.id, categoryId);
    return this;
  }

  async listEntities(categoryId: string): Promise<Result<TrackedEntity[], Error>> {
    if (this.failingCategories.has(categoryId)) {
      return ErrResult(new Error(`category ${categoryId} unavailable`));
    }
    return OkResult([...(this.categories.get(categoryId) ?? [])]);
  }

  async resolveCategory(channelId: string): Promise<string | null> {
    if (this.resolveError) throw this.resolveError;
    return this.parents.get(channelId) ?? null;
  }
}

export interface PublishedMessage<TPayload> {
  destinationId: string;
  payload: TPayload;
}

export class FakePublishTarget<TPayload> implements PublishTarget<TPayload> {
  readonly messages = new Map<string, PublishedMessage<TPayload>>();
  readonly sends: string[] = [];
  readonly edits: string[] = [];
  readonly removals: string[] = [];
  failing = false;
  failingRemovals = false;
  private nextId = 1;

  async send(destinationId: string, payload: TPayload): Promise<Result<string, ActivityError>> {
    if (this.failing) {
      return ErrResult(new ActivityError("PUBLISH_TARGET_UNAVAILABLE", "send failed"));
    }
    const id = `msg-${this.nextId++}`;
    this.messages.set(id, { destinationId, payload });
    this.sends.push(destinationId);
    return OkResult(id);
  }

  async edit(
    destinationId: string,
    messageId: string,
    payload: TPayload,
  ): Promise<Result<EditOutcome, ActivityError>> {
    if (this.failing) {
      return ErrResult(new ActivityError("PUBLISH_TARGET_UNAVAILABLE", "edit failed"));
    }
    const existing = this.messages.get(messageId);
    if (!existing || existing.destinationId !== destinationId) return OkResult("not_found");
    this.messages.set(messageId, { destinationId, payload });
    this.edits.push(messageId);
    return OkResult("edited");
  }

  async remove(destinationId: string, messageId: string): Promise<Result<void, ActivityError>> {
    if (this.failing || this.failingRemovals) {
      return ErrResult(new ActivityError("PUBLISH_TARGET_UNAVAILABLE", "delete failed"));
    }
    const existing = this.messages.get(messageId);
    if (existing && existing.destinationId === destinationId) this.messages.delete(messageId);
    this.removals.push(messageId);
    return OkResult(undefined);
  }
}

export class FakeHistory implements MessageHistory {
  readonly channels = new Map<string, HistoricalMessage[]>();
  readonly failingChannels = new Set<string>();

  /** Messages are stored newest first, as the platform returns them. */
  set(channelId: string, messages: HistoricalMessage[]): this {
    this.channels.set(channelId, [...messages].sort((a, b) => b.timestamp - a.timestamp));
    return this;
  }

  async *iterateSince(channelId: string, since: UnixSeconds): AsyncIterable<HistoricalMessage> {
    if (this.failingChannels.has(channelId)) throw new Error(`history of ${channelId} unavailable`);
    for (const message of this.channels.get(channelId) ?? []) {
      if (message.timestamp < since) return;
      yield message;
    }
  }
}
