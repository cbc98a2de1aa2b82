import { Router } from "express";
import { fieldUpdateSchema, lineupUpdateSchema } from "../lib/validation.js";
import { getField, getLineup, saveField, saveLineup } from "../services/lineup.js";

const router = Router();

router.get("/lineup", async (_req, res) => {
  res.json(await getLineup());
});

router.put("/lineup", async (req, res) => {
  const { lineup } = lineupUpdateSchema.parse(req.body);
  res.json(await saveLineup(lineup));
});

router.get("/field", async (_req, res) => {
  res.json(await getField());
});

router.put("/field", async (req, res) => {
  const { field_positions } = fieldUpdateSchema.parse(req.body);
  res.json(await saveField(field_positions));
});

export default router;
