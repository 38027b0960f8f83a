import { MongoClient, type Db } from "mongodb";
import { env } from "@/config/env.js";
import { logger } from "@/config/logger.js";

let client: MongoClient | null = null;
let db: Db | null = null;

export async function connectMongo(): Promise<Db> {
  if (db) return db;
  if (!env.MONGODB_URI) throw new Error("mongodb-uri-missing");

  client = new MongoClient(env.MONGODB_URI);
  await client.connect();
  db = client.db(env.MONGODB_DB);
  await Promise.all([
    db.collection("pools").createIndex({ poolId: 1 }, { unique: true }),
    db.collection("pool-events").createIndex({ poolId: 1, seq: 1 }, { unique: true }),
    db.collection("pool-events").createIndex({ poolId: 1, account: 1, seq: -1 }),
    db.collection("pool-events").createIndex({ poolId: 1, type: 1, seq: -1 }),
  ]);
  logger.info({ db: env.MONGODB_DB }, "mongodb-connected");
  return db;
}

export async function closeMongo(): Promise<void> {
  if (!client) return;
  await client.close();
  client = null;
  db = null;
  logger.info("mongodb-closed");
}
