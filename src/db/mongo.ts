/**
 * Mongo client singleton for the native driver.
 * Purpose: single entrypoint to obtain the database handle (`getDb`), the client for
 * sessions (`getMongoClient`) and to close it (`disconnectDb`).
 */
import { MongoClient, type Db } from "mongodb";
import { getConfig } from "@/configuration/env";

let client: MongoClient | null = null;
let dbInstance: Db | null = null;
let connecting: Promise<MongoClient> | null = null;

export async function getMongoClient(): Promise<MongoClient> {
  if (client && dbInstance) return client;
  if (connecting) return connecting;

  const config = getConfig();
  if (!config.mongo.uri) {
    throw new Error("MongoDB URI not configured (MONGO_URI).");
  }

  const next = new MongoClient(config.mongo.uri, {
    serverSelectionTimeoutMS: config.mongo.timeoutMs,
    socketTimeoutMS: config.mongo.timeoutMs,
  });
  connecting = next
    .connect()
    .then((connected) => {
      client = connected;
      dbInstance = connected.db(config.mongo.dbName);
      return connected;
    })
    .finally(() => {
      connecting = null;
    });
  return connecting;
}

export async function getDb(): Promise<Db> {
  if (dbInstance) return dbInstance;
  await getMongoClient();
  if (!dbInstance) throw new Error("MongoDB connection did not initialize.");
  return dbInstance;
}

export async function disconnectDb(): Promise<void> {
  if (client) {
    await client.close();
  }
  client = null;
  dbInstance = null;
}
