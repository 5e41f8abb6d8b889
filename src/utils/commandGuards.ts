import type { CommandContext } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { getActivityRuntime, type ActivityRuntime } from "@/modules/activity";

export const GENERIC_FAILURE = "Something went wrong. The details were logged for the admins.";

/**
 * Returns the activity runtime or replies with an ephemeral notice when the engine is
 * disabled.
 */
export async function requireActivityRuntime(
  ctx: Pick<CommandContext, "write">,
): Promise<ActivityRuntime | null> {
  const runtime = getActivityRuntime();
  if (runtime) return runtime;
  await ctx.write({
    content: "Activity tracking is not available right now.",
    flags: MessageFlags.Ephemeral,
  });
  return null;
}
