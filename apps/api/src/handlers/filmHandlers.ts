import type { Request, Response } from "express";
import type {
  ApiInfoResponse,
  ErrorResponse,
  FilmFilters,
  HealthResponse,
  WelcomeResponse,
} from "@mockbuster/types";
import { z } from "zod";
import { isFilmNotFound, messageOf } from "../errors";
import { DEFAULT_LIMIT, DEFAULT_PAGE } from "../repository/filmQuery";
import type { CommentService, FilmService } from "../service/types";

// both fields present and non-empty; length limits are the service's
const commentBody = z.object({
  customer_name: z.string().min(1, "Required"),
  comment: z.string().min(1, "Required"),
});

const INTEGER = /^[+-]?\d+$/;

export class InvalidFilmIdError extends Error {
  constructor(raw: string) {
    super(`film ID must be an integer, got "${raw}"`);
    this.name = "InvalidFilmIdError";
  }
}

/** First value of a query parameter, or "" when absent. */
export function queryString(value: unknown): string {
  if (Array.isArray(value)) return queryString(value[0]);
  return typeof value === "string" ? value : "";
}

// Base-10 integer within the safe range, else undefined.
function parseInteger(raw: string): number | undefined {
  if (!INTEGER.test(raw)) return undefined;
  const n = Number(raw);
  return Number.isSafeInteger(n) ? n : undefined;
}

/** Base-10 integer above zero, or the fallback. */
export function parsePositiveInt(value: unknown, fallback: number): number {
  const n = parseInteger(queryString(value));
  return n !== undefined && n > 0 ? n : fallback;
}

export function parseFilmId(raw: string): number {
  const n = parseInteger(raw);
  if (n === undefined) throw new InvalidFilmIdError(raw);
  return n;
}

export function parseFilmFilters(query: Request["query"]): FilmFilters {
  return {
    title: queryString(query.title),
    rating: queryString(query.rating),
    category: queryString(query.category),
    page: parsePositiveInt(query.page, DEFAULT_PAGE),
    limit: parsePositiveInt(query.limit, DEFAULT_LIMIT),
  };
}

export function respondWithError(res: Response, status: number, summary: string, err: unknown) {
  const body: ErrorResponse = { error: summary, details: messageOf(err) };
  res.status(status).json(body);
}

// not found → 404, anything else the service raises → 500
function respondWithServiceError(res: Response, err: unknown, summary: string) {
  if (isFilmNotFound(err)) return respondWithError(res, 404, "Film not found", err);
  respondWithError(res, 500, summary, err);
}

export class FilmHandler {
  constructor(
    private readonly films: FilmService,
    private readonly comments: CommentService,
  ) {}

  // GET /api/v1/films
  getFilms = async (req: Request, res: Response) => {
    const filters = parseFilmFilters(req.query);
    try {
      res.json(await this.films.getFilms(filters));
    } catch (err) {
      respondWithServiceError(res, err, "Failed to retrieve films");
    }
  };

  // GET /api/v1/films/:id
  getFilmById = async (req: Request, res: Response) => {
    const filmId = filmIdOrRespond(req, res);
    if (filmId === undefined) return;

    try {
      res.json(await this.films.getFilmById(filmId));
    } catch (err) {
      respondWithServiceError(res, err, "Failed to retrieve film");
    }
  };

  // GET /api/v1/categories
  getCategories = async (_req: Request, res: Response) => {
    try {
      res.json(await this.films.getCategories());
    } catch (err) {
      respondWithError(res, 500, "Failed to retrieve categories", err);
    }
  };

  // POST /api/v1/films/:id/comments
  addComment = async (req: Request, res: Response) => {
    const filmId = filmIdOrRespond(req, res);
    if (filmId === undefined) return;

    const body = commentBody.safeParse(req.body);
    if (!body.success) {
      const details = body.error.issues
        .map((issue) =>
          issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
        )
        .join("; ");
      return respondWithError(res, 400, "Validation failed", details);
    }

    try {
      const comment = await this.comments.addComment(filmId, body.data);
      res.status(201).json(comment);
    } catch (err) {
      respondWithServiceError(res, err, "Failed to add comment");
    }
  };

  // GET /api/v1/films/:id/comments
  getComments = async (req: Request, res: Response) => {
    const filmId = filmIdOrRespond(req, res);
    if (filmId === undefined) return;

    try {
      res.json(await this.comments.getCommentsByFilmId(filmId));
    } catch (err) {
      respondWithServiceError(res, err, "Failed to retrieve comments");
    }
  };
}

// Answers 400 itself and returns undefined when the path id is not an integer.
function filmIdOrRespond(req: Request, res: Response): number | undefined {
  try {
    return parseFilmId(req.params.id ?? "");
  } catch (err) {
    respondWithError(res, 400, "Invalid film ID", err);
    return undefined;
  }
}

// GET /
export function welcome(_req: Request, res: Response) {
  const body: WelcomeResponse = { message: "Welcome to Mockbuster Movie API!" };
  res.json(body);
}

export const API_INFO: ApiInfoResponse = {
  name: "Mockbuster Movie API",
  version: "1.0",
  description: "A RESTful API for the Mockbuster DVD rental business",
  endpoints: [
    "GET /api/v1/films - List films with filtering and pagination",
    "GET /api/v1/films/{id} - Get detailed film information",
    "GET /api/v1/categories - List all available categories",
    "POST /api/v1/films/{id}/comments - Add a comment to a film",
    "GET /api/v1/films/{id}/comments - Get comments for a film",
  ],
};

// GET /api/v1
export function apiInfo(_req: Request, res: Response) {
  res.json(API_INFO);
}

// GET /health
export function health(ping: () => Promise<void>) {
  return async (_req: Request, res: Response) => {
    const [db] = await Promise.allSettled([ping()]);
    const status = db.status === "fulfilled" ? "ok" : "down";
    const body: HealthResponse = { ok: status === "ok", services: { db: status } };
    res.status(body.ok ? 200 : 503).json(body);
  };
}
