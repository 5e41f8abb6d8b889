/**
 * `/activity recalculate [months]`: rebuild every tracked channel's statistics from
 * message history, then republish the reports.
 */
import {
  createIntegerOption,
  Declare,
  type GuildCommandContext,
  Options,
  SubCommand,
} from "seyfert";
import { MessageFlags } from "seyfert/lib/types";
import { buildRecalculateEmbed } from "@/modules/activity/embeds";
import { GENERIC_FAILURE, requireActivityRuntime } from "@/utils/commandGuards";

const options = {
  months: createIntegerOption({
    description: "How many months of history to replay (default 1)",
    required: false,
    min_value: 1,
  }),
};

@Declare({
  name: "recalculate",
  description: "Rebuild activity statistics from message history",
  defaultMemberPermissions: ["ManageChannels"],
  contexts: ["Guild"],
})
@Options(options)
export default class ActivityRecalculateCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const runtime = await requireActivityRuntime(ctx);
    if (!runtime) return;
    await ctx.deferReply(true);

    ctx.client.logger.info(`[activity] recalculation requested by ${ctx.author.id}`);
    const result = await runtime.recalculator.run(ctx.options.months ?? 1);
    if (result.isErr()) {
      ctx.client.logger.error("[activity] recalculation failed", { error: result.error });
      await ctx.editOrReply({ content: GENERIC_FAILURE, flags: MessageFlags.Ephemeral });
      return;
    }

    await runtime.scheduler.runReportNow();
    await ctx.editOrReply({
      embeds: [buildRecalculateEmbed(result.value)],
      flags: MessageFlags.Ephemeral,
    });
  }
}
