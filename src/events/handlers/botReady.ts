/**
 * Forwards Seyfert's `botReady` event to the internal hooks.
 */
import { createEvent } from "seyfert";
import { emitBotReady } from "@/events/hooks/botReady";

export default createEvent({
  data: { name: "botReady" },
  async run(user, client, shardId) {
    client.logger.info(`${user.username} is online`);
    await emitBotReady(user, client, shardId);
  },
});
