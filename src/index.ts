import { createServer } from "node:http";
import { WebSocketServer } from "ws";
import { mkdirSync, existsSync } from "node:fs";
import { resolve } from "node:path";
import { loadConfig } from "./config.js";
import { createLogger } from "./logger.js";
import { SqliteDatabase, SqliteConversationRepository } from "./db/sqlite.js";
import { AgentProcessSupervisor, buildLaunchOptions, spawnAgentProcess } from "./agents/supervisor.js";
import { AgentProtocolClient } from "./agents/client.js";
import { createToolSummarizer } from "./agents/summarizer.js";
import { createSpeechSynthesizer } from "./speech/synthesizer.js";
import { StoredConversation } from "./conversation/history.js";
import { RequestCoordinator } from "./conversation/coordinator.js";
import { ConnectionManager } from "./server/connection.js";
import { createApp } from "./server/app.js";

const config = loadConfig();
const logger = createLogger(config);

const dataDir = resolve(process.cwd(), config.dataDir);
if (!existsSync(dataDir)) {
  mkdirSync(dataDir, { recursive: true });
}

const workingDirectory = resolve(process.cwd(), config.workingDirectory);
if (!existsSync(workingDirectory)) {
  mkdirSync(workingDirectory, { recursive: true });
}

const dbPath = resolve(dataDir, "parley.db");
const database = new SqliteDatabase(dbPath);
database.initialize();
logger.info({ dbPath }, "Database initialized");

const conversations = new SqliteConversationRepository(database.db);
const summarizer = createToolSummarizer(config, logger);
const speech = createSpeechSynthesizer(config, logger);
const launch = buildLaunchOptions({ ...config, workingDirectory });

// One agent process, client and coordinator per connection
const connections = new ConnectionManager((conversationId, channel) => {
  const sessionLogger = logger.child({ conversationId });
  const supervisor = new AgentProcessSupervisor({
    launcher: spawnAgentProcess,
    launch,
    timings: config,
    logger: sessionLogger,
  });
  const client = new AgentProtocolClient({ supervisor, summarizer, logger: sessionLogger });
  const coordinator = new RequestCoordinator({
    client,
    conversation: new StoredConversation(conversationId, conversations, sessionLogger),
    channel,
    speech,
    logger: sessionLogger,
  });

  return {
    coordinator,
    info: {
      type: "session_info",
      conversation_id: conversationId,
      working_dir: workingDirectory,
      permission_mode: config.permissionMode,
      speech_enabled: speech !== null,
    },
  };
}, logger);

const app = createApp({ conversations, connections, logger });
const server = createServer(app);

const wss = new WebSocketServer({ server, path: "/ws" });

wss.on("connection", (ws, req) => {
  const url = new URL(req.url ?? "/ws", "http://localhost");
  const connection = connections.accept(ws, url.searchParams.get("conversation"));
  if (!connection) return;

  ws.on("message", (data) => {
    connection.handleFrame(data.toString()).catch((error: unknown) => {
      logger.error({ error, conversationId: connection.conversationId }, "Failed to handle client message");
    });
  });

  ws.on("close", () => {
    connections.release(connection).catch((error: unknown) => {
      logger.error({ error, conversationId: connection.conversationId }, "Failed to close connection");
    });
  });
});

server.listen(config.port, config.host, () => {
  logger.info({ port: config.port, host: config.host, agent: config.agentCommand }, "Parley is running");
  logger.info(`   WebSocket: ws://${config.host}:${config.port}/ws`);
});

let shuttingDown = false;

async function gracefulShutdown(): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info("Shutting down...");

  await connections.closeAll();
  wss.close();
  server.close();
  database.close();
  process.exit(0);
}

function onSignal(): void {
  gracefulShutdown().catch((error: unknown) => {
    logger.error({ error }, "Shutdown failed");
    process.exit(1);
  });
}

process.on("SIGINT", onSignal);
process.on("SIGTERM", onSignal);
