import type {
  Category,
  Comment,
  CommentRequest,
  Film,
  FilmFilters,
  FilmListResponse,
} from "@mockbuster/types";

export interface FilmService {
  getFilms(filters: FilmFilters): Promise<FilmListResponse>;
  getFilmById(filmId: number): Promise<Film>;
  getCategories(): Promise<Category[]>;
}

export interface CommentService {
  addComment(filmId: number, request: CommentRequest): Promise<Comment>;
  getCommentsByFilmId(filmId: number): Promise<Comment[]>;
}
