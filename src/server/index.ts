import http from "http";
import { loadConfig } from "./config";
import { createHttpApp } from "./http";
import { Moderator } from "./moderator";
import { RoomPlatform } from "./platform";
import { GameDirectory } from "./store";
import { WebSocketGateway } from "./ws";

// Bootstrap: file-backed directory, in-process platform, moderator, HTTP + WebSocket layers.

const config = loadConfig();

const directory = new GameDirectory(config.dataDir);
const platform = new RoomPlatform();
const moderator = new Moderator(directory, platform, {
  moderatorIds: config.moderatorIds,
  minPlayers: config.minPlayers
});

const app = createHttpApp(directory);
const server = http.createServer(app);

const gateway = new WebSocketGateway(moderator, platform, directory);
gateway.attach(server);

server.listen(config.port, () => {
  console.log(`Crew moderator running on port ${config.port}`);
  console.log(`Data directory: ${config.dataDir}`);
  console.log("Health check: GET /health");
});
