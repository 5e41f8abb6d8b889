/**
 * `/activity clear <channel>`: drop a channel's counters and event log.
 */
import {
  createChannelOption,
  Declare,
  type GuildCommandContext,
  Options,
  SubCommand,
} from "seyfert";
import { ChannelType, MessageFlags } from "seyfert/lib/types";
import { GENERIC_FAILURE, requireActivityRuntime } from "@/utils/commandGuards";

const options = {
  channel: createChannelOption({
    description: "Channel whose statistics will be erased",
    required: true,
    channel_types: [ChannelType.GuildText],
  }),
};

@Declare({
  name: "clear",
  description: "Erase activity statistics for a channel",
  defaultMemberPermissions: ["ManageChannels"],
  contexts: ["Guild"],
})
@Options(options)
export default class ActivityClearCommand extends SubCommand {
  async run(ctx: GuildCommandContext<typeof options>) {
    const runtime = await requireActivityRuntime(ctx);
    if (!runtime) return;

    const channelId = ctx.options.channel.id;
    const cleared = await runtime.store.clear(channelId);
    if (cleared.isErr()) {
      ctx.client.logger.error("[activity] clear failed", { channelId, error: cleared.error });
      await ctx.write({ content: GENERIC_FAILURE, flags: MessageFlags.Ephemeral });
      return;
    }

    ctx.client.logger.info(`[activity] ${ctx.author.id} cleared statistics of ${channelId}`);
    await ctx.write({
      content: `Activity statistics for <#${channelId}> were cleared.`,
      flags: MessageFlags.Ephemeral,
    });
  }
}
