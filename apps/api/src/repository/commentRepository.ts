import type { Comment, CommentRequest } from "@mockbuster/types";
import type { Database } from "../db";
import { DatabaseError, FilmNotFoundError } from "../errors";
import { FILM_EXISTS_QUERY } from "./filmQuery";
import type { CommentRepository } from "./types";

const INSERT_COMMENT = `
  INSERT INTO film_comments (film_id, customer_name, comment, created_at)
  VALUES ($1, $2, $3, $4)
  RETURNING id, film_id, customer_name, comment, created_at`;

const COMMENTS_BY_FILM = `
  SELECT id, film_id, customer_name, comment, created_at
  FROM film_comments
  WHERE film_id = $1
  ORDER BY created_at DESC`;

export class PgCommentRepository implements CommentRepository {
  constructor(
    private readonly db: Database,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async addComment(filmId: number, request: CommentRequest): Promise<Comment> {
    await this.assertFilmExists(filmId);

    let rows: Comment[];
    try {
      rows = await this.db.query<Comment>(INSERT_COMMENT, [
        filmId,
        request.customer_name,
        request.comment,
        this.now(),
      ]);
    } catch (err) {
      throw new DatabaseError("error inserting comment", err);
    }

    const inserted = rows[0];
    if (!inserted) throw new DatabaseError("error inserting comment", "no row returned");
    return inserted;
  }

  async getCommentsByFilmId(filmId: number): Promise<Comment[]> {
    await this.assertFilmExists(filmId);

    try {
      return await this.db.query<Comment>(COMMENTS_BY_FILM, [filmId]);
    } catch (err) {
      throw new DatabaseError("error querying comments", err);
    }
  }

  private async assertFilmExists(filmId: number): Promise<void> {
    let rows: { exists: boolean }[];
    try {
      rows = await this.db.query<{ exists: boolean }>(FILM_EXISTS_QUERY, [filmId]);
    } catch (err) {
      throw new DatabaseError("error checking film existence", err);
    }
    if (!rows[0]?.exists) throw new FilmNotFoundError();
  }
}
