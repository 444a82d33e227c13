import { connect, disconnect } from "mongoose";
import type { AppConfig } from "../config/env.js";
import logger from "../utils/logger.js";

async function connectToDatabase(config: AppConfig["mongo"]) {
  try {
    await connect(config.url, { dbName: config.dbName });
    logger.info({ dbName: config.dbName }, "Connected to MongoDB");
  } catch (error) {
    throw new Error("Could not connect to MongoDB", { cause: error });
  }
}

async function disconnectFromDatabase() {
  try {
    await disconnect();
  } catch (error) {
    throw new Error("Could not disconnect from MongoDB", { cause: error });
  }
}

export { connectToDatabase, disconnectFromDatabase };
