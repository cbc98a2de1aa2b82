import { Router } from "express";
import { ValidationError } from "../lib/errors.js";
import { bulkGameStatsSchema, gameCreateSchema, gameUpdateSchema } from "../lib/validation.js";
import { createGame, deleteGame, getGame, listGames, updateGame } from "../services/games.js";
import { getGameStats, saveGameStats } from "../services/gameStats.js";

const router = Router();

// Most recent first
router.get("/", async (_req, res) => {
  res.json(await listGames());
});

router.post("/", async (req, res) => {
  const input = gameCreateSchema.parse(req.body);
  res.status(201).json(await createGame(input));
});

router.get("/:id", async (req, res) => {
  res.json(await getGame(req.params.id));
});

router.put("/:id", async (req, res) => {
  const input = gameUpdateSchema.parse(req.body);
  res.json(await updateGame(req.params.id, input));
});

// Removes the game's stat lines as well
router.delete("/:id", async (req, res) => {
  await deleteGame(req.params.id);
  res.status(204).end();
});

router.get("/:id/stats", async (req, res) => {
  res.json(await getGameStats(req.params.id));
});

router.post("/:id/stats", async (req, res) => {
  const { game_id, stats } = bulkGameStatsSchema.parse(req.body);
  if (game_id !== undefined && game_id !== req.params.id) {
    throw new ValidationError("game_id in body does not match the URL");
  }
  res.json(await saveGameStats(req.params.id, stats));
});

export default router;
