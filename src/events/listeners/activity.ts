/**
 * Wires the activity engine to gateway events: readiness starts the scheduler, every
 * message goes through the tracker.
 */
import { onBotReady } from "@/events/hooks/botReady";
import { onMessageCreate } from "@/events/hooks/messageCreate";
import { getActivityRuntime } from "@/modules/activity";

onBotReady(() => {
  getActivityRuntime()?.markReady();
});

onMessageCreate(async (message) => {
  const runtime = getActivityRuntime();
  if (!runtime) return;
  await runtime.tracker.handleMessage(message);
});
