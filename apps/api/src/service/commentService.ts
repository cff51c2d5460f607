import type { Comment, CommentRequest } from "@mockbuster/types";
import { ValidationError, isFilmNotFound } from "../errors";
import { getLogger, Logger } from "../logger";
import type { CommentRepository, FilmRepository } from "../repository/types";
import { validateFilmId } from "./filmService";
import type { CommentService } from "./types";

export const MAX_CUSTOMER_NAME_LENGTH = 100;
export const MAX_COMMENT_LENGTH = 1000;

// Length in code points, so an emoji counts once.
const charCount = (value: string) => [...value].length;

/** First failing rule wins: name required, name length, text required, text length. */
export function validateComment(request: CommentRequest): void {
  if (request.customer_name === "") {
    throw new ValidationError("customer name is required");
  }
  if (charCount(request.customer_name) > MAX_CUSTOMER_NAME_LENGTH) {
    throw new ValidationError(
      `customer name too long (max ${MAX_CUSTOMER_NAME_LENGTH} characters)`,
    );
  }
  if (request.comment === "") {
    throw new ValidationError("comment text is required");
  }
  if (charCount(request.comment) > MAX_COMMENT_LENGTH) {
    throw new ValidationError(`comment text too long (max ${MAX_COMMENT_LENGTH} characters)`);
  }
}

export class CommentServiceImpl implements CommentService {
  constructor(
    private readonly comments: CommentRepository,
    private readonly films: FilmRepository,
    private readonly logger: Logger = getLogger(),
  ) {}

  async addComment(filmId: number, request: CommentRequest): Promise<Comment> {
    try {
      validateFilmId(filmId);
    } catch (err) {
      this.logger.warn({ filmId }, "Invalid film ID provided");
      throw err;
    }

    try {
      validateComment(request);
    } catch (err) {
      this.logger.warn({ filmId, err }, "Invalid comment provided");
      throw err;
    }

    await this.ensureFilmExists(filmId, "Cannot add comment to non-existent film");

    try {
      const comment = await this.comments.addComment(filmId, request);
      this.logger.info({ filmId, commentId: comment.id }, "Successfully added comment");
      return comment;
    } catch (err) {
      this.logger.error({ filmId, err }, "Failed to add comment to repository");
      throw err;
    }
  }

  async getCommentsByFilmId(filmId: number): Promise<Comment[]> {
    try {
      validateFilmId(filmId);
    } catch (err) {
      this.logger.warn({ filmId }, "Invalid film ID provided");
      throw err;
    }

    await this.ensureFilmExists(filmId, "Cannot get comments for non-existent film");

    try {
      const comments = await this.comments.getCommentsByFilmId(filmId);
      this.logger.info({ filmId, count: comments.length }, "Successfully retrieved comments");
      return comments;
    } catch (err) {
      this.logger.error({ filmId, err }, "Failed to retrieve comments from repository");
      throw err;
    }
  }

  private async ensureFilmExists(filmId: number, notFoundMessage: string): Promise<void> {
    try {
      await this.films.getFilmById(filmId);
    } catch (err) {
      if (isFilmNotFound(err)) {
        this.logger.warn({ filmId }, notFoundMessage);
      } else {
        this.logger.error({ filmId, err }, "Failed to verify film exists");
      }
      throw err;
    }
  }
}
