/**
 * Peer Chat Configuration Module
 *
 * Holds global configuration for chat sessions, display tags and the
 * Hyperswarm connector. Values are validated with zod on every update.
 */

import { z } from "zod";

export const ChatConfigSchema = z.object({
  /** Maximum bytes handed to the reassembler per read event */
  chunkSize: z.number().int().positive().default(4096),
  /** Lines longer than this are dropped whole */
  maxFragmentBytes: z.number().int().positive().default(1024 * 1024),
  /** Extra comma-separated tags added to incoming private lines */
  pvTags: z.string().default("notify_private"),
  nickColors: z
    .object({
      self: z.string().min(1).default("white"),
      other: z.string().min(1).default("cyan"),
    })
    .default({}),
  /** Substituted for client-native escapes that cannot be parsed */
  placeholder: z.string().length(1).default("?"),
  /** Charset spoken by peers when a session names none */
  charset: z.string().min(1).optional(),
  /** Bootstrap nodes for DHT discovery (e.g., ["172.24.0.1:49737"]) */
  bootstrap: z.array(z.string()).optional(),
  /** Connection timeout in milliseconds */
  connectionTimeout: z.number().int().positive().optional(),
});

export type ChatConfig = z.infer<typeof ChatConfigSchema>;
export type ChatConfigInput = z.input<typeof ChatConfigSchema>;

// Global config store
let globalConfig: ChatConfig = ChatConfigSchema.parse({});

/**
 * Merge and validate a partial configuration into the global one
 */
export function setChatConfig(config: ChatConfigInput): ChatConfig {
  globalConfig = ChatConfigSchema.parse({
    ...globalConfig,
    ...config,
    nickColors: { ...globalConfig.nickColors, ...config.nickColors },
  });
  return globalConfig;
}

/**
 * Get the current chat configuration
 */
export function getChatConfig(): ChatConfig {
  return globalConfig;
}

export function resetChatConfig(): void {
  globalConfig = ChatConfigSchema.parse({});
}

/**
 * Split the configured private-message tags into a list
 */
export function getPvTags(): string[] {
  return globalConfig.pvTags
    .split(",")
    .map((tag) => tag.trim())
    .filter((tag) => tag.length > 0);
}

/**
 * Get Hyperswarm options with bootstrap configured
 */
export function getSwarmOptions(): { bootstrap?: string[] } {
  if (globalConfig.bootstrap && globalConfig.bootstrap.length > 0) {
    return { bootstrap: globalConfig.bootstrap };
  }
  return {};
}
