import express from "express";
import { buildGameView } from "../shared/messages";
import type { GameDirectory } from "./store";

/**
 * Minimal Express app exposing health/debug endpoints.
 * All gameplay happens over WebSockets; these routes are intentionally tiny.
 */
export function createHttpApp(directory: GameDirectory) {
  const app = express();
  app.use(express.json());

  /** Health probe for load balancers / ops. */
  app.get("/health", (_req, res) => {
    const games = directory.listGames();
    res.json({
      status: "ok",
      games: games.length,
      activeGames: games.filter(game => game.status === "ACTIVE").length,
      npcs: directory.listNpcs().length,
      timestamp: Date.now()
    });
  });

  /**
   * Debug-only game dump. Roles stay hidden unless `?reveal=1` is passed.
   * Do not expose publicly without authentication.
   */
  app.get("/games/:name", (req, res) => {
    const game = directory.loadGame(req.params.name);
    if (!game) {
      return res.status(404).json({ error: "Game not found" });
    }
    return res.json(req.query.reveal === "1" ? game : buildGameView(game, null));
  });

  app.get("/npcs", (_req, res) => {
    res.json(directory.listNpcs());
  });

  return app;
}
