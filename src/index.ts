/**
 * peerchat: line-oriented direct chat with one peer over a raw byte stream.
 *
 * Embed it by opening a chat over any Duplex:
 *
 *   const { session } = openChat(socket, { localNick: "alice", remoteNick: "bob", sink });
 *   session.input("hello");
 */

export * from "./types.js";
export {
  ChatConfigSchema,
  getChatConfig,
  setChatConfig,
  resetChatConfig,
  getPvTags,
  getSwarmOptions,
} from "./config.js";
export type { ChatConfig, ChatConfigInput } from "./config.js";
export { logger } from "./logger.js";
export { getChatStats, incrementStat, resetStats } from "./stats.js";
export type { ChatStats } from "./stats.js";
export { reassemble } from "./reassembler.js";
export type { ReassemblyResult } from "./reassembler.js";
export {
  identityTranscoder,
  isIdentityTranscoder,
  createCharsetTranscoder,
  resolveTranscoder,
} from "./transcoder.js";
export {
  ansiIrcColorCodec,
  stripAnsi,
  expandIrcColors,
  colorSequence,
  colorForTags,
  paint,
} from "./colors.js";
export { decodeLine, detectAction, defaultPipeline } from "./decoder.js";
export type { DecodePipeline } from "./decoder.js";
export { encodeLine, sendLine, writeAll } from "./sender.js";
export {
  DisplayRouter,
  formatTags,
  inboundTags,
  echoTags,
  formatInbound,
} from "./display.js";
export type { DisplayTarget } from "./display.js";
export { ChatSession } from "./session.js";
export type { ChatSessionOptions, CloseListener } from "./session.js";
export { SessionRegistry } from "./registry.js";
export { openChat, attachSession, duplexSocket } from "./reactor.js";
export type { ChatTask, OpenChatOptions } from "./reactor.js";
export { createChatSwarm, hashTopic, shortKey } from "./swarm.js";
export type { ChatSwarm, ChatSwarmOptions, SwarmLike } from "./swarm.js";
export { createConsoleSink } from "./console-sink.js";
export { handleChatCommand, attachTerminal, claimTerminal, parseFlags, chatCommand } from "./cli-commands.js";
