/**
 * Forwards Seyfert's `messageCreate` event to the internal hooks.
 */
import { createEvent } from "seyfert";
import { emitMessageCreate } from "@/events/hooks/messageCreate";

export default createEvent({
  data: { name: "messageCreate" },
  async run(message, client, shardId) {
    await emitMessageCreate(message, client, shardId);
  },
});
