import { z } from "zod";

/**
 * WebSocket envelope: every message is `{ type, ...payload }` in a JSON text frame.
 * This file is the source of truth for client/server communication.
 */

// ----------------------------
// Shared primitives
// ----------------------------

export const LangCodeSchema = z.string().trim().toLowerCase().min(2).max(8);
export type LangCode = z.infer<typeof LangCodeSchema>;

export const SessionConfigSchema = z.object({
  source_language: LangCodeSchema.nullable(),
  target_language: LangCodeSchema,
});

// ----------------------------
// Client -> Server
// ----------------------------

export const ClientConfigSchema = z.object({
  type: z.literal("config"),
  /**
   * Omitted or null means auto-detect.
   */
  source_language: LangCodeSchema.nullish(),
  target_language: LangCodeSchema,
});
export type ClientConfig = z.infer<typeof ClientConfigSchema>;

export const ClientChunkSchema = z.object({
  type: z.literal("chunk"),
  /**
   * Only `base64` is accepted. Kept as a free string here so the session can
   * answer a precise error instead of a generic schema mismatch.
   */
  encoding: z.string(),
  data: z.string(),
});
export type ClientChunk = z.infer<typeof ClientChunkSchema>;

export const ClientFlushSchema = z.object({
  type: z.literal("flush"),
});
export type ClientFlush = z.infer<typeof ClientFlushSchema>;

export const ClientCloseSchema = z.object({
  type: z.literal("close"),
});
export type ClientClose = z.infer<typeof ClientCloseSchema>;

export const ClientToServerSchema = z.discriminatedUnion("type", [
  ClientConfigSchema,
  ClientChunkSchema,
  ClientFlushSchema,
  ClientCloseSchema,
]);
export type ClientToServerMessage = z.infer<typeof ClientToServerSchema>;

// ----------------------------
// Server -> Client
// ----------------------------

export const ConfigAckSchema = z.object({
  type: z.literal("config_ack"),
  config: SessionConfigSchema,
});
export type ConfigAck = z.infer<typeof ConfigAckSchema>;

export const InterimSchema = z.object({
  type: z.literal("interim"),
  text: z.string(),
  detected_language: z.string(),
  translated_text: z.string().optional(),
});
export type Interim = z.infer<typeof InterimSchema>;

export const FinalSchema = z.object({
  type: z.literal("final"),
  original_text: z.string(),
  translated_text: z.string(),
  detected_language: z.string(),
  target_language: z.string(),
  /**
   * Set when no model exists for the language pair and the original text was
   * returned untranslated.
   */
  translation_skipped: z.boolean().optional(),
});
export type Final = z.infer<typeof FinalSchema>;

export const ErrorCodeSchema = z.enum([
  "invalid_json",
  "invalid_message",
  "not_configured",
  "unsupported_language",
  "malformed_input",
  "processing_failed",
]);
export type ErrorCode = z.infer<typeof ErrorCodeSchema>;

export const ServerErrorSchema = z.object({
  type: z.literal("error"),
  detail: z.string(),
  code: ErrorCodeSchema.optional(),
});
export type ServerError = z.infer<typeof ServerErrorSchema>;

export const ServerToClientSchema = z.discriminatedUnion("type", [
  ConfigAckSchema,
  InterimSchema,
  FinalSchema,
  ServerErrorSchema,
]);
export type ServerToClientMessage = z.infer<typeof ServerToClientSchema>;

// ----------------------------
// Helpers
// ----------------------------

export function safeParseClientMessage(data: unknown) {
  return ClientToServerSchema.safeParse(data);
}

export function safeParseServerMessage(data: unknown) {
  return ServerToClientSchema.safeParse(data);
}
