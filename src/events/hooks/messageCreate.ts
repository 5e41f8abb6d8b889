/**
 * Hook for the `messageCreate` event.
 */
import type { ResolveEventParams } from "seyfert";
import { createEventHook } from "@/events/hooks/createEventHook";

export type MessageCreateArgs = ResolveEventParams<"messageCreate">;

export const [
  onMessageCreate,
  onceMessageCreate,
  offMessageCreate,
  emitMessageCreate,
  clearMessageCreateListeners,
] = createEventHook<MessageCreateArgs>().make();
