/**
 * `/activity refresh`: resync tracked channels and republish both reports now.
 */
import { Declare, type GuildCommandContext, SubCommand } from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { describeReportOutcome } from "@/modules/activity/embeds";
import { GENERIC_FAILURE, requireActivityRuntime } from "@/utils/commandGuards";

@Declare({
  name: "refresh",
  description: "Sync tracked channels and refresh the activity reports",
  defaultMemberPermissions: ["ManageChannels"],
  contexts: ["Guild"],
})
export default class ActivityRefreshCommand extends SubCommand {
  async run(ctx: GuildCommandContext) {
    const runtime = await requireActivityRuntime(ctx);
    if (!runtime) return;
    await ctx.deferReply(true);

    const synced = await runtime.registry.refresh();
    if (synced.isErr()) {
      ctx.client.logger.error("[activity] channel sync failed", { error: synced.error });
      await ctx.editOrReply({ content: GENERIC_FAILURE, flags: MessageFlags.Ephemeral });
      return;
    }

    const tick = await runtime.scheduler.runReportNow();
    const lines = [
      `Tracked channels: ${synced.value.total} (+${synced.value.added} / -${synced.value.removed})`,
    ];
    if (tick.status === "completed") {
      lines.push(...tick.value.map(describeReportOutcome));
    } else if (tick.status === "skipped") {
      lines.push("A report refresh is already running.");
    } else {
      lines.push(GENERIC_FAILURE);
    }

    await ctx.editOrReply({ content: lines.join("\n"), flags: MessageFlags.Ephemeral });
  }
}
