/**
 * Hook for the `botReady` event: single place to subscribe to and emit it.
 */
import type { ResolveEventParams } from "seyfert";
import { createEventHook } from "@/events/hooks/createEventHook";

/** Parameters Seyfert passes to `botReady`. */
export type BotReadyArgs = ResolveEventParams<"botReady">;

export const [
  /** Registers a permanent listener; returns a function that removes it. */
  onBotReady,
  onceBotReady,
  offBotReady,
  /** Runs every registered listener with the gateway event data. */
  emitBotReady,
  clearBotReadyListeners,
] = createEventHook<BotReadyArgs>().make();
