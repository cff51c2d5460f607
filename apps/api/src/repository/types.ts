import type {
  Category,
  Comment,
  CommentRequest,
  Film,
  FilmFilters,
  FilmListResponse,
} from "@mockbuster/types";

export interface FilmRepository {
  /** Films matching the filters, one page at a time, plus the total match count. */
  getFilms(filters: FilmFilters): Promise<FilmListResponse>;

  /** Rejects with FilmNotFoundError when no film has this id. */
  getFilmById(filmId: number): Promise<Film>;

  getCategories(): Promise<Category[]>;
}

export interface CommentRepository {
  /** Rejects with FilmNotFoundError, without inserting, when the film is missing. */
  addComment(filmId: number, request: CommentRequest): Promise<Comment>;

  /** Newest first. Rejects with FilmNotFoundError when the film is missing. */
  getCommentsByFilmId(filmId: number): Promise<Comment[]>;
}
