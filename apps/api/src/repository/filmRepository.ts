import type { Category, Film, FilmFilters, FilmListResponse } from "@mockbuster/types";
import type { Database } from "../db";
import { DatabaseError, FilmNotFoundError } from "../errors";
import {
  CATEGORIES_QUERY,
  FILM_ACTORS_QUERY,
  FILM_BY_ID_QUERY,
  FILM_CATEGORIES_QUERY,
  buildFilmsCountQuery,
  buildFilmsQuery,
  normalizePagination,
  parseSpecialFeatures,
} from "./filmQuery";
import type { FilmRepository } from "./types";

// numeric and bigint columns arrive as strings from pg
export interface FilmRow {
  film_id: number;
  title: string;
  description: string | null;
  release_year: number | null;
  language_id: number;
  rental_duration: number;
  rental_rate: string;
  length: number | null;
  replacement_cost: string;
  rating: string | null;
  last_update: Date;
  special_features: string | null;
}

export class PgFilmRepository implements FilmRepository {
  constructor(private readonly db: Database) {}

  async getFilms(input: FilmFilters): Promise<FilmListResponse> {
    const filters = normalizePagination(input);
    const page = buildFilmsQuery(filters);
    const count = buildFilmsCountQuery(filters);

    // Page and count are independent; run them side by side
    const [rows, countRows] = await Promise.all([
      this.run("error querying films", () => this.db.query<FilmRow>(page.text, page.values)),
      this.run("error counting films", () =>
        this.db.query<{ total: string }>(count.text, count.values),
      ),
    ]);

    // one film at a time: at most two enrichment queries in flight
    const films: Film[] = [];
    for (const row of rows) {
      films.push(await this.toFilm(row));
    }

    return {
      films,
      total: Number(countRows[0]?.total ?? 0),
      page: filters.page,
      limit: filters.limit,
    };
  }

  async getFilmById(filmId: number): Promise<Film> {
    const rows = await this.run("error querying film", () =>
      this.db.query<FilmRow>(FILM_BY_ID_QUERY, [filmId]),
    );
    const row = rows[0];
    if (!row) throw new FilmNotFoundError();

    return this.toFilm(row);
  }

  async getCategories(): Promise<Category[]> {
    return this.run("error querying categories", () =>
      this.db.query<Category>(CATEGORIES_QUERY),
    );
  }

  private async toFilm(row: FilmRow): Promise<Film> {
    const [categories, actors] = await Promise.all([
      this.getFilmCategories(row.film_id),
      this.getFilmActors(row.film_id),
    ]);

    return {
      film_id: row.film_id,
      title: row.title,
      description: row.description ?? undefined,
      release_year: row.release_year ?? undefined,
      language_id: row.language_id,
      rental_duration: row.rental_duration,
      rental_rate: Number(row.rental_rate),
      length: row.length ?? undefined,
      replacement_cost: Number(row.replacement_cost),
      rating: row.rating ?? "",
      last_update: row.last_update,
      special_features: parseSpecialFeatures(row.special_features),
      categories,
      actors,
    };
  }

  private async getFilmCategories(filmId: number): Promise<string[]> {
    const rows = await this.run("error querying film categories", () =>
      this.db.query<{ name: string }>(FILM_CATEGORIES_QUERY, [filmId]),
    );
    return rows.map((row) => row.name);
  }

  private async getFilmActors(filmId: number): Promise<string[]> {
    const rows = await this.run("error querying film actors", () =>
      this.db.query<{ actor_name: string }>(FILM_ACTORS_QUERY, [filmId]),
    );
    return rows.map((row) => row.actor_name);
  }

  private async run<T>(context: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw new DatabaseError(context, err);
    }
  }
}
