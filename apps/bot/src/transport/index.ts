export * from "./types.js";
export * from "./errors.js";
export { answerQuietly, safeEdit, type EditOutcome, type EditTarget } from "./safe-edit.js";
export { TelegramTransport, classifyTelegramError } from "./telegram-transport.js";
export { MockTransport, type RecordedCall } from "./mock-transport.js";
