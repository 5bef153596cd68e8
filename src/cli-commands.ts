/**
 * Peer Chat CLI Commands
 *
 *   peerchat listen [--port <port>] [--host <host>]
 *   peerchat connect <host> <port>
 *   peerchat swarm <topic>
 *
 * Common options: --nick <nick>, --remote-nick <nick>, --charset <charset>
 */

import { connect as netConnect, createServer } from "net";
import { createInterface } from "readline";
import type { Readable, Writable } from "stream";
import { z } from "zod";
import { getChatConfig } from "./config.js";
import { createConsoleSink } from "./console-sink.js";
import { logger } from "./logger.js";
import type { ChatTask } from "./reactor.js";
import { openChat } from "./reactor.js";
import { createChatSwarm } from "./swarm.js";
import { resolveTranscoder } from "./transcoder.js";
import { EXIT_INVALID, EXIT_OFFLINE, EXIT_OK, EXIT_SEND_FAILED } from "./types.js";

export const DEFAULT_PORT = 6680;

export interface CliIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
}

const PortSchema = z.string().pipe(z.coerce.number().int().min(1).max(65535));

const FlagsSchema = z.object({
  nick: z.string().min(1).default(process.env.USER || "me"),
  "remote-nick": z.string().min(1).optional(),
  charset: z.string().min(1).optional(),
  port: PortSchema.default(String(DEFAULT_PORT)),
  host: z.string().min(1).default("127.0.0.1"),
});

type ChatFlags = z.infer<typeof FlagsSchema>;

export const chatCommand = {
  name: "peerchat",
  description: "Direct line-oriented chat with one peer",
  usage: [
    "peerchat listen [--port <port>] [--host <host>]",
    "peerchat connect <host> <port>",
    "peerchat swarm <topic>",
    "",
    "Options: --nick <nick> --remote-nick <nick> --charset <charset>",
  ].join("\n"),
};

// Parse flags from args
export function parseFlags(args: string[]): { flags: Record<string, string | boolean>; positional: string[] } {
  const flags: Record<string, string | boolean> = {};
  const positional: string[] = [];

  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith("--")) {
      const key = args[i].slice(2);
      if (i + 1 < args.length && !args[i + 1].startsWith("--")) {
        flags[key] = args[++i];
      } else {
        flags[key] = true;
      }
    } else {
      positional.push(args[i]);
    }
  }

  return { flags, positional };
}

function processIO(): CliIO {
  return { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };
}

/**
 * Connect a running chat to the terminal: stdin lines are sent, stdin EOF
 * ends the chat. Resolves with the exit code once the session ends.
 */
export function attachTerminal(task: ChatTask, io: CliIO): Promise<number> {
  const { session } = task;
  if (session.hasEnded()) {
    return Promise.resolve(session.status === "failed" ? EXIT_SEND_FAILED : EXIT_OK);
  }

  return new Promise((resolve) => {
    const rl = createInterface({ input: io.stdin, terminal: false });
    let ended = false;

    session.onClose((_session, reason) => {
      ended = true;
      rl.close();
      resolve(reason === "failed" ? EXIT_SEND_FAILED : EXIT_OK);
    });

    rl.on("line", (line) => {
      if (line.length > 0) session.input(line);
    });
    rl.on("close", () => {
      if (!ended) task.cancel();
    });
  });
}

function listen(flags: ChatFlags, io: CliIO): Promise<number> {
  return new Promise((resolve, reject) => {
    const server = createServer();
    server.maxConnections = 1;
    server.once("error", reject);
    server.once("connection", (socket) => {
      server.close();
      const task = openChat(socket, {
        localNick: flags.nick,
        remoteNick: flags["remote-nick"] ?? socket.remoteAddress ?? "peer",
        remoteAddress: `${socket.remoteAddress}:${socket.remotePort}`,
        charset: flags.charset,
        sink: createConsoleSink(io.stdout),
      });
      resolve(attachTerminal(task, io));
    });
    server.listen(flags.port, flags.host, () => {
      io.stdout.write(`Waiting for a peer on ${flags.host}:${flags.port}\n`);
    });
  });
}

function connect(host: string, port: number, flags: ChatFlags, io: CliIO): Promise<number> {
  return new Promise((resolve, reject) => {
    const socket = netConnect({ host, port });
    const { connectionTimeout } = getChatConfig();
    const onTimeout = () => {
      socket.destroy(new Error(`Connection to ${host}:${port} timed out`));
    };
    if (connectionTimeout) {
      socket.setTimeout(connectionTimeout, onTimeout);
    }
    socket.once("error", reject);
    socket.once("connect", () => {
      socket.off("error", reject);
      socket.setTimeout(0);
      socket.off("timeout", onTimeout);
      const task = openChat(socket, {
        localNick: flags.nick,
        remoteNick: flags["remote-nick"] ?? host,
        remoteAddress: `${host}:${port}`,
        charset: flags.charset,
        sink: createConsoleSink(io.stdout),
      });
      resolve(attachTerminal(task, io));
    });
  });
}

/**
 * Chat handler that gives the terminal to the first chat only. Later chats
 * are cancelled so typed lines never reach two peers.
 */
export function claimTerminal(io: CliIO, onDone: (code: number) => void): (task: ChatTask) => void {
  let claimed = false;
  return (task) => {
    if (claimed) {
      logger.info(`[cli] Already chatting, closing chat with ${task.session.remoteNick}`);
      task.cancel();
      return;
    }
    claimed = true;
    attachTerminal(task, io)
      .then(onDone)
      .catch((err: unknown) => {
        logger.error(`[cli] Terminal chat failed: ${err}`);
        onDone(EXIT_OFFLINE);
      });
  };
}

function joinSwarm(topic: string, flags: ChatFlags, io: CliIO): Promise<number> {
  return new Promise((resolve, reject) => {
    const swarm = createChatSwarm({
      topic,
      localNick: flags.nick,
      charset: flags.charset,
      sink: createConsoleSink(io.stdout),
      onChat: claimTerminal(io, (code) => {
        swarm.destroy().then(() => resolve(code), reject);
      }),
    });
    io.stdout.write(`Looking for a peer on topic "${topic}"\n`);
  });
}

/**
 * Handle the `peerchat` command. Resolves with the process exit code.
 */
export async function handleChatCommand(args: string[], io: CliIO = processIO()): Promise<number> {
  const subcommand = args[0];
  const { flags, positional } = parseFlags(args.slice(1));

  if (!subcommand || subcommand === "help" || subcommand === "--help") {
    io.stdout.write(`${chatCommand.usage}\n`);
    return subcommand ? EXIT_OK : EXIT_INVALID;
  }

  const parsed = FlagsSchema.safeParse(flags);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`);
    io.stderr.write(`Invalid options: ${issues.join("; ")}\n`);
    return EXIT_INVALID;
  }
  const options = parsed.data;

  try {
    resolveTranscoder(options.charset);
  } catch (err) {
    io.stderr.write(`${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_INVALID;
  }

  try {
    switch (subcommand) {
      case "listen":
        return await listen(options, io);

      case "connect": {
        const [host, portArg] = positional;
        const port = PortSchema.safeParse(portArg);
        if (!host || !port.success) {
          io.stderr.write(`Usage: peerchat connect <host> <port>\n`);
          return EXIT_INVALID;
        }
        return await connect(host, port.data, options, io);
      }

      case "swarm": {
        const [topic] = positional;
        if (!topic) {
          io.stderr.write(`Usage: peerchat swarm <topic>\n`);
          return EXIT_INVALID;
        }
        return await joinSwarm(topic, options, io);
      }

      default:
        io.stderr.write(`Unknown command: ${subcommand}\n${chatCommand.usage}\n`);
        return EXIT_INVALID;
    }
  } catch (err) {
    logger.error(`[cli] ${subcommand} failed: ${err}`);
    io.stderr.write(`peerchat: ${err instanceof Error ? err.message : String(err)}\n`);
    return EXIT_OFFLINE;
  }
}
