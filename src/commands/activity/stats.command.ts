/**
 * `/activity stats <channel>`: counters, recent count and score of one channel.
 */
import {
  createChannelOption,
  Declare,
  type GuildCommandContext,
  Options,
  SubCommand,
} from "seyfert";
import { ChannelType, MessageFlags } from "seyfert/lib/types";
import { buildChannelStatsEmbed } from "@/modules/activity/embeds";
import { GENERIC_FAILURE, requireActivityRuntime } from "@/utils/commandGuards";

const options = {
  channel: createChannelOption({
    description: "Channel to inspect",
    required: true,
    channel_types: [ChannelType.GuildText],
  }),
};

@Declare({
  name: "stats",
  description: "Show activity statistics for a channel",
  defaultMemberPermissions: ["ManageChannels"],
  contexts: ["Guild"],
})
@Options(options)
export default class ActivityStatsCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const runtime = await requireActivityRuntime(ctx);
    if (!runtime) return;

    const channelId = ctx.options.channel.id;
    const [counters, metrics] = await Promise.all([
      runtime.store.getCounters(channelId),
      runtime.aggregator.metrics(channelId),
    ]);
    if (counters.isErr() || metrics.isErr()) {
      ctx.client.logger.error("[activity] stats failed", {
        channelId,
        error: counters.isErr() ? counters.error : metrics.isErr() ? metrics.error : null,
      });
      await ctx.write({ content: GENERIC_FAILURE, flags: MessageFlags.Ephemeral });
      return;
    }

    await ctx.write({
      embeds: [buildChannelStatsEmbed(channelId, counters.value, metrics.value)],
      flags: MessageFlags.Ephemeral,
    });
  }
}
