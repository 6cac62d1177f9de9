export * from "./types";
export * from "./appError";
export * from "./env";
export { logger, componentLogger } from "./logger";
export type { Logger } from "./logger";
export { createR2Client } from "./r2";
export * from "./retry";
