import { Router } from "express";
import type { PatternStore } from "./types.js";

/**
 * Creates an Express router with read-only REST endpoints over the pattern store.
 */
export function createApiRouter(store: PatternStore): Router {
  const router = Router();

  router.get("/patterns", (_req, res) => {
    res.json({ patterns: store.listPatterns() });
  });

  router.get("/patterns/:name", (req, res) => {
    const lookup = store.getPattern(req.params.name);

    switch (lookup.status) {
      case "found":
        res.json({ found: true, name: lookup.name, text: lookup.text });
        return;
      case "not-found":
        res.status(404).json({ found: false, name: lookup.name });
        return;
      case "invalid":
        res.status(400).json({ error: lookup.reason });
        return;
      case "error":
        res.status(500).json({ error: `Error reading pattern "${lookup.name}": ${lookup.message}` });
        return;
    }
  });

  return router;
}
