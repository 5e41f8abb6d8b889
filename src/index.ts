/**
 * Bot entrypoint: loads configuration, composes the activity engine, then starts Seyfert
 * and uploads the slash commands.
 */
import "module-alias/register";
import "dotenv/config";

import type { ParseClient } from "seyfert";
import { Client } from "seyfert";
import { getConfig } from "@/configuration/env";
import { disconnectDb } from "@/db/mongo";
import { createActivityRuntime, type ActivityRuntime } from "@/modules/activity";

import "./events/listeners"; // ! Registers listeners on their hooks before any event arrives

const client = new Client<true>();
let activity: ActivityRuntime | null = null;

async function bootstrap(): Promise<void> {
  console.log("[bootstrap] Starting bot...");
  const config = getConfig();

  activity = await createActivityRuntime(client, config);
  if (!activity) {
    console.warn("[bootstrap] Activity engine disabled; continuing without it.");
  }

  await client.start();
  await client.uploadCommands({ cachePath: "./commands.json" });

  activity?.start().catch((error) => {
    console.error("[bootstrap] Activity scheduler failed to start:", error);
  });
}

async function shutdown(signal: string): Promise<void> {
  console.log(`[bootstrap] ${signal} received, shutting down...`);
  activity?.stop();
  await disconnectDb();
  process.exit(0);
}

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    shutdown(signal).catch((error) => {
      console.error("[bootstrap] Shutdown failed:", error);
      process.exit(1);
    });
  });
}

bootstrap().catch((error) => {
  console.error("[bootstrap] Failed to start bot:", error);
  process.exit(1);
});

declare module "seyfert" {
  interface UsingClient extends ParseClient<Client<true>> {}
}
