import { Router } from "express";
import { configurationCreateSchema } from "../lib/validation.js";
import {
  createConfiguration,
  deleteConfiguration,
  listConfigurations,
  loadConfiguration,
} from "../services/configurations.js";

const router = Router();

router.get("/", async (_req, res) => {
  res.json(await listConfigurations());
});

router.post("/", async (req, res) => {
  const input = configurationCreateSchema.parse(req.body);
  res.status(201).json(await createConfiguration(input));
});

// Loading a configuration marks it as used
router.get("/:id", async (req, res) => {
  res.json(await loadConfiguration(req.params.id));
});

router.delete("/:id", async (req, res) => {
  await deleteConfiguration(req.params.id);
  res.status(204).end();
});

export default router;
