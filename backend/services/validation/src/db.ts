// backend/services/validation/src/db.ts
import mongoose from "mongoose";
import { logger } from "@shared/utils/logger";

const redact = (uri: string): string => uri.replace(/:\/\/.*@/, "://***:***@");

export async function connectDb(uri: string): Promise<void> {
  try {
    await mongoose.connect(uri);
    logger.info(
      { component: "mongodb", uri: redact(uri) },
      "[MongoDB-validation] Connected"
    );
  } catch (err) {
    logger.error(
      {
        component: "mongodb",
        uri: redact(uri),
        error: err instanceof Error ? err.message : String(err),
      },
      "[MongoDB-validation] Connection error"
    );
    throw err;
  }
}

export async function disconnectDb(): Promise<void> {
  await mongoose.disconnect();
}
