import type { EventEmitter } from "events";
import { Redis } from "ioredis";
import z from "zod";
import { AppKeySchema, SEARCH_MODES } from "./config.js";
import { ARR_ROTATOR_EVENTS_CHANNEL_NAME } from "./constants.js";

const ItemIds = z.array(z.number().int().nonnegative());

// Trigger → Scheduler: run a tick now, optionally for a subset of the apps
export const RunRequestedEvent = z.object({
  type: z.literal("run_requested"),
  data: z.object({
    apps: z.array(AppKeySchema).optional(),
    requestedBy: z.string(),
  }),
  timestamp: z.string(),
});
export type RunRequestedEvent = z.infer<typeof RunRequestedEvent>;

// Scheduler → listeners: searches were triggered (or previewed, on dry runs)
export const SearchDispatchedEvent = z.object({
  type: z.literal("search_dispatched"),
  data: z.object({
    app: AppKeySchema,
    mode: z.enum(SEARCH_MODES),
    bucket: z.string(),
    ids: ItemIds,
    dryRun: z.boolean(),
  }),
  timestamp: z.string(),
});
export type SearchDispatchedEvent = z.infer<typeof SearchDispatchedEvent>;

// Scheduler → listeners: items moved from the search tag to the done tag
export const ItemsPromotedEvent = z.object({
  type: z.literal("items_promoted"),
  data: z.object({
    app: AppKeySchema,
    ids: ItemIds,
    dryRun: z.boolean(),
  }),
  timestamp: z.string(),
});
export type ItemsPromotedEvent = z.infer<typeof ItemsPromotedEvent>;

export const ArrRotatorEvent = z.discriminatedUnion("type", [
  RunRequestedEvent,
  SearchDispatchedEvent,
  ItemsPromotedEvent,
]);
export type ArrRotatorEvent = z.infer<typeof ArrRotatorEvent>;

export type EventPublisher = {
  produceEvent: (event: ArrRotatorEvent) => Promise<void>;
};

/* --- Serialization helpers --- */
export function serializeEvent(event: ArrRotatorEvent): string {
  return JSON.stringify(event);
}

/** Returns null for anything that is not a well-formed event. */
export function deserializeEvent(data: string): ArrRotatorEvent | null {
  let raw: unknown;
  try {
    raw = JSON.parse(data);
  } catch {
    return null;
  }
  const parsed = ArrRotatorEvent.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

/* --- Consumer: subscribe to Redis and pass events to a handler --- */
export type ConsumerCallbacks = {
  onInvalid: (message: string) => void;
  onError: (error: unknown, event: ArrRotatorEvent) => void;
  onConnectionError: (error: Error) => void;
};

/** Wires message and connection-error listeners onto a subscribed client. */
export function listenForArrRotatorEvents(
  source: EventEmitter,
  handler: (event: ArrRotatorEvent) => Promise<void> | void,
  callbacks: ConsumerCallbacks
): void {
  source.on("error", (error: Error) => callbacks.onConnectionError(error));
  source.on("message", (_channel: string, message: string) => {
    const event = deserializeEvent(message);
    if (!event) {
      callbacks.onInvalid(message);
      return;
    }
    void Promise.resolve()
      .then(() => handler(event))
      .catch((error: unknown) => callbacks.onError(error, event));
  });
}

export async function consumeArrRotatorEvents(
  redisUrl: string,
  handler: (event: ArrRotatorEvent) => Promise<void> | void,
  callbacks: ConsumerCallbacks
): Promise<Redis> {
  const redis = new Redis(redisUrl);
  listenForArrRotatorEvents(redis, handler, callbacks);
  await redis.subscribe(ARR_ROTATOR_EVENTS_CHANNEL_NAME);
  return redis;
}

/* --- Producer: publish events to the Redis channel --- */
export function createArrRotatorEventProducer(
  redisUrl: string,
  onConnectionError: (error: Error) => void
): EventPublisher & { close: () => Promise<void> } {
  const redis = new Redis(redisUrl);
  redis.on("error", onConnectionError);
  return {
    produceEvent: async (event: ArrRotatorEvent): Promise<void> => {
      const serializedEvent = serializeEvent(event);
      await redis.publish(ARR_ROTATOR_EVENTS_CHANNEL_NAME, serializedEvent);
    },
    close: async (): Promise<void> => {
      await redis.quit();
    },
  };
}

/** Publisher used when no event bus is configured. */
export const noopEventPublisher: EventPublisher = {
  produceEvent: async () => undefined,
};
