import { Router } from "express";
import { playerCreateSchema, playerUpdateSchema } from "../lib/validation.js";
import { createPlayer, deletePlayer, getPlayer, listPlayers, updatePlayer } from "../services/players.js";
import { getPlayerGameStats, getPlayerSeasonStats } from "../services/gameStats.js";

const router = Router();

router.get("/", async (_req, res) => {
  res.json(await listPlayers());
});

router.post("/", async (req, res) => {
  const input = playerCreateSchema.parse(req.body);
  res.status(201).json(await createPlayer(input));
});

router.get("/:id", async (req, res) => {
  res.json(await getPlayer(req.params.id));
});

router.put("/:id", async (req, res) => {
  const input = playerUpdateSchema.parse(req.body);
  res.json(await updatePlayer(req.params.id, input));
});

// Also clears the player from the lineup, field and every saved configuration
router.delete("/:id", async (req, res) => {
  await deletePlayer(req.params.id);
  res.status(204).end();
});

// Per-game stat lines, most recent game first
router.get("/:id/stats", async (req, res) => {
  res.json(await getPlayerGameStats(req.params.id));
});

router.get("/:id/stats/season", async (req, res) => {
  res.json(await getPlayerSeasonStats(req.params.id));
});

export default router;
