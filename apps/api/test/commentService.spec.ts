import { describe, it, expect, vi } from "vitest";
import type { Comment } from "@mockbuster/types";
import { DatabaseError, FilmNotFoundError, ValidationError } from "../src/errors";
import type { CommentRepository, FilmRepository } from "../src/repository/types";
import { CommentServiceImpl, validateComment } from "../src/service/commentService";
import { silentLogger } from "./helpers/fakes";

const saved: Comment = {
  id: 7,
  film_id: 1,
  customer_name: "John Doe",
  comment: "Great movie!",
  created_at: new Date("2024-03-01T12:00:00.000Z"),
};

function setup() {
  const comments = {
    addComment: vi.fn(),
    getCommentsByFilmId: vi.fn(),
  } satisfies CommentRepository;
  const films = {
    getFilms: vi.fn(),
    getFilmById: vi.fn(),
    getCategories: vi.fn(),
  } satisfies FilmRepository;

  films.getFilmById.mockResolvedValue({ film_id: 1, title: "Academy Dinosaur" });
  comments.addComment.mockResolvedValue(saved);
  comments.getCommentsByFilmId.mockResolvedValue([saved]);

  return { comments, films, service: new CommentServiceImpl(comments, films, silentLogger) };
}

describe("validateComment", () => {
  it.each([
    [{ customer_name: "", comment: "ok" }, "customer name is required"],
    [{ customer_name: "a".repeat(101), comment: "ok" }, "customer name too long (max 100 characters)"],
    [{ customer_name: "Jane", comment: "" }, "comment text is required"],
    [{ customer_name: "Jane", comment: "b".repeat(1001) }, "comment text too long (max 1000 characters)"],
  ])("rejects %j", (request, message) => {
    expect(() => validateComment(request)).toThrow(new ValidationError(message));
  });

  it("reports the name before the comment", () => {
    expect(() => validateComment({ customer_name: "", comment: "" })).toThrow(
      "customer name is required",
    );
    expect(() =>
      validateComment({ customer_name: "a".repeat(101), comment: "b".repeat(1001) }),
    ).toThrow("customer name too long (max 100 characters)");
  });

  it("accepts values at the limits", () => {
    expect(() =>
      validateComment({ customer_name: "a".repeat(100), comment: "b".repeat(1000) }),
    ).not.toThrow();
  });

  it("counts characters, not UTF-16 units", () => {
    expect(() => validateComment({ customer_name: "😀".repeat(100), comment: "ok" })).not.toThrow();
  });
});

describe("CommentServiceImpl.addComment", () => {
  it("adds the comment once the film is confirmed", async () => {
    const { comments, films, service } = setup();
    const request = { customer_name: "John Doe", comment: "Great movie!" };

    await expect(service.addComment(1, request)).resolves.toBe(saved);
    expect(films.getFilmById).toHaveBeenCalledWith(1);
    expect(comments.addComment).toHaveBeenCalledWith(1, request);
  });

  it("rejects a non-positive film id", async () => {
    const { films, service } = setup();

    await expect(
      service.addComment(0, { customer_name: "Jane", comment: "Hi" }),
    ).rejects.toThrow(new ValidationError("invalid film ID"));
    expect(films.getFilmById).not.toHaveBeenCalled();
  });

  it("validates the request before looking up the film", async () => {
    const { films, service } = setup();

    await expect(
      service.addComment(1, { customer_name: "a".repeat(101), comment: "Hi" }),
    ).rejects.toThrow("customer name too long (max 100 characters)");
    expect(films.getFilmById).not.toHaveBeenCalled();
  });

  it("does not insert for a missing film", async () => {
    const { comments, films, service } = setup();
    films.getFilmById.mockRejectedValue(new FilmNotFoundError());

    await expect(
      service.addComment(99999, { customer_name: "Jane", comment: "Hi" }),
    ).rejects.toBeInstanceOf(FilmNotFoundError);
    expect(comments.addComment).not.toHaveBeenCalled();
  });

  it("propagates insert failures", async () => {
    const { comments, service } = setup();
    const failure = new DatabaseError("error inserting comment", new Error("disk full"));
    comments.addComment.mockRejectedValue(failure);

    await expect(service.addComment(1, { customer_name: "Jane", comment: "Hi" })).rejects.toBe(
      failure,
    );
  });
});

describe("CommentServiceImpl.getCommentsByFilmId", () => {
  it("returns the film's comments", async () => {
    const { comments, service } = setup();

    await expect(service.getCommentsByFilmId(1)).resolves.toEqual([saved]);
    expect(comments.getCommentsByFilmId).toHaveBeenCalledWith(1);
  });

  it("rejects a non-positive film id", async () => {
    const { service } = setup();

    await expect(service.getCommentsByFilmId(-4)).rejects.toThrow("invalid film ID");
  });

  it("propagates not-found from the film check", async () => {
    const { comments, films, service } = setup();
    films.getFilmById.mockRejectedValue(new FilmNotFoundError());

    await expect(service.getCommentsByFilmId(5)).rejects.toBeInstanceOf(FilmNotFoundError);
    expect(comments.getCommentsByFilmId).not.toHaveBeenCalled();
  });
});
