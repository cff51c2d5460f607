import { Router } from "express";
import { asyncHandler } from "./asyncHandler";
import { FilmHandler, apiInfo, health, welcome } from "./handlers/filmHandlers";

export function createRouter(handler: FilmHandler, ping: () => Promise<void>): Router {
  const router = Router();

  router.get("/", welcome);
  router.get("/health", asyncHandler(health(ping)));

  // ─── /api/v1 ──────────────────────────────────────────────
  const api = Router();
  api.get("/", apiInfo);

  api.get("/films", asyncHandler(handler.getFilms));
  api.get("/films/:id", asyncHandler(handler.getFilmById));
  api.get("/categories", asyncHandler(handler.getCategories));

  api.post("/films/:id/comments", asyncHandler(handler.addComment));
  api.get("/films/:id/comments", asyncHandler(handler.getComments));

  router.use("/api/v1", api);
  return router;
}
