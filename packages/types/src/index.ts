// Shared entity and wire types for the Mockbuster API.
// Timestamps are Date on the server and ISO strings once serialized.

export interface Film {
  film_id: number;
  title: string;
  description?: string;
  release_year?: number;
  language_id: number;
  rental_duration: number;
  rental_rate: number;
  length?: number;
  replacement_cost: number;
  rating: string; // G | PG | PG-13 | R | NC-17, or "" when unset
  last_update: Date;
  special_features: string[];
  categories: string[];
  actors: string[];
}

export interface Category {
  category_id: number;
  name: string;
}

export interface Comment {
  id: number;
  film_id: number;
  customer_name: string;
  comment: string;
  created_at: Date;
}

export interface CommentRequest {
  customer_name: string;
  comment: string;
}

export interface FilmFilters {
  title?: string;
  rating?: string;
  category?: string;
  page: number;
  limit: number;
}

export interface FilmListResponse {
  films: Film[];
  total: number;
  page: number;
  limit: number;
}

export interface ErrorResponse {
  error: string;
  details: string;
}

export interface WelcomeResponse {
  message: string;
}

export interface ApiInfoResponse {
  name: string;
  version: string;
  description: string;
  endpoints: string[];
}

export interface HealthResponse {
  ok: boolean;
  services: {
    db: "ok" | "down";
  };
}
