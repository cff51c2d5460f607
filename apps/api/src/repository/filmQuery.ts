import type { FilmFilters } from "@mockbuster/types";

export const DEFAULT_PAGE = 1;
export const DEFAULT_LIMIT = 10;

export interface SqlQuery {
  text: string;
  values: unknown[];
}

const FILM_COLUMNS = `
  f.film_id, f.title, f.description, f.release_year,
  f.language_id, f.rental_duration, f.rental_rate, f.length,
  f.replacement_cost, f.rating, f.last_update,
  f.special_features::text AS special_features`;

const FILM_JOINS = `
  FROM film f
  LEFT JOIN film_category fc ON f.film_id = fc.film_id
  LEFT JOIN category c ON fc.category_id = c.category_id
  WHERE 1=1`;

/** Page 1 and limit 10 stand in for anything missing or non-positive. */
export function normalizePagination(filters: FilmFilters): FilmFilters {
  return {
    ...filters,
    page: filters.page > 0 ? filters.page : DEFAULT_PAGE,
    limit: filters.limit > 0 ? filters.limit : DEFAULT_LIMIT,
  };
}

// Predicates are added only for non-empty filters, numbered $1.. in
// title, rating, category order.
function filterClause(filters: FilmFilters): SqlQuery {
  let text = "";
  const values: unknown[] = [];

  if (filters.title) {
    values.push(`%${filters.title}%`);
    text += ` AND f.title ILIKE $${values.length}`;
  }
  if (filters.rating) {
    values.push(filters.rating);
    text += ` AND f.rating = $${values.length}`;
  }
  if (filters.category) {
    values.push(`%${filters.category}%`);
    text += ` AND c.name ILIKE $${values.length}`;
  }

  return { text, values };
}

export function buildFilmsQuery(filters: FilmFilters): SqlQuery {
  const where = filterClause(filters);
  const values = [...where.values, filters.limit, (filters.page - 1) * filters.limit];
  const limitParam = where.values.length + 1;

  return {
    text:
      `SELECT DISTINCT ${FILM_COLUMNS}${FILM_JOINS}${where.text}` +
      ` ORDER BY f.title LIMIT $${limitParam} OFFSET $${limitParam + 1}`,
    values,
  };
}

export function buildFilmsCountQuery(filters: FilmFilters): SqlQuery {
  const where = filterClause(filters);
  return {
    text: `SELECT COUNT(DISTINCT f.film_id) AS total${FILM_JOINS}${where.text}`,
    values: where.values,
  };
}

export const FILM_BY_ID_QUERY = `SELECT ${FILM_COLUMNS}
  FROM film f
  WHERE f.film_id = $1`;

export const FILM_CATEGORIES_QUERY = `
  SELECT c.name
  FROM category c
  JOIN film_category fc ON c.category_id = fc.category_id
  WHERE fc.film_id = $1
  ORDER BY c.name`;

export const FILM_ACTORS_QUERY = `
  SELECT a.first_name || ' ' || a.last_name AS actor_name
  FROM actor a
  JOIN film_actor fa ON a.actor_id = fa.actor_id
  WHERE fa.film_id = $1
  ORDER BY a.last_name, a.first_name`;

export const CATEGORIES_QUERY =
  "SELECT category_id, name FROM category ORDER BY name";

export const FILM_EXISTS_QUERY =
  "SELECT EXISTS(SELECT 1 FROM film WHERE film_id = $1) AS exists";

/**
 * Parses the text form of a text[] column, e.g. `{Trailers,"Deleted Scenes"}`.
 * NULL and `{}` give an empty list.
 */
export function parseSpecialFeatures(raw: string | null): string[] {
  if (!raw) return [];
  const inner = raw.replace(/^\{/, "").replace(/\}$/, "");
  if (inner === "") return [];
  return inner.split(",").map((item) => item.replace(/^"(.*)"$/, "$1"));
}
