import type { Category, Film, FilmFilters, FilmListResponse } from "@mockbuster/types";
import { ValidationError, isFilmNotFound } from "../errors";
import { getLogger, Logger } from "../logger";
import { normalizePagination } from "../repository/filmQuery";
import type { FilmRepository } from "../repository/types";
import type { FilmService } from "./types";

export const RATINGS = ["G", "PG", "PG-13", "R", "NC-17"] as const;
export type Rating = (typeof RATINGS)[number];

export const MAX_LIMIT = 100;

const RATING_SET: ReadonlySet<string> = new Set(RATINGS);

export function isRating(value: string): value is Rating {
  return RATING_SET.has(value);
}

export function validateFilmId(filmId: number): void {
  if (!Number.isInteger(filmId) || filmId <= 0) {
    throw new ValidationError("invalid film ID");
  }
}

/**
 * Checks the filters exactly as given. An explicit page of 0 fails here even
 * though the handler and repository would default it.
 */
export function validateFilters(filters: FilmFilters): void {
  if (filters.page < 1) {
    throw new ValidationError("page must be greater than 0");
  }
  if (filters.limit < 1 || filters.limit > MAX_LIMIT) {
    throw new ValidationError("limit must be between 1 and 100");
  }
  if (filters.rating && !isRating(filters.rating)) {
    throw new ValidationError("invalid rating provided");
  }
}

export class FilmServiceImpl implements FilmService {
  constructor(
    private readonly films: FilmRepository,
    private readonly logger: Logger = getLogger(),
  ) {}

  async getFilms(filters: FilmFilters): Promise<FilmListResponse> {
    try {
      validateFilters(filters);
    } catch (err) {
      this.logger.warn({ filters, err }, "Invalid filters provided");
      throw err;
    }

    const normalized = normalizePagination(filters);

    try {
      const result = await this.films.getFilms(normalized);
      this.logger.info(
        { count: result.films.length, total: result.total },
        "Successfully retrieved films",
      );
      return result;
    } catch (err) {
      this.logger.error({ filters: normalized, err }, "Failed to retrieve films from repository");
      throw err;
    }
  }

  async getFilmById(filmId: number): Promise<Film> {
    try {
      validateFilmId(filmId);
    } catch (err) {
      this.logger.warn({ filmId }, "Invalid film ID provided");
      throw err;
    }

    try {
      const film = await this.films.getFilmById(filmId);
      this.logger.info({ filmId, title: film.title }, "Successfully retrieved film");
      return film;
    } catch (err) {
      if (isFilmNotFound(err)) {
        this.logger.warn({ filmId }, "Film not found");
      } else {
        this.logger.error({ filmId, err }, "Failed to retrieve film from repository");
      }
      throw err;
    }
  }

  async getCategories(): Promise<Category[]> {
    try {
      const categories = await this.films.getCategories();
      this.logger.info({ count: categories.length }, "Successfully retrieved categories");
      return categories;
    } catch (err) {
      this.logger.error({ err }, "Failed to retrieve categories from repository");
      throw err;
    }
  }
}
