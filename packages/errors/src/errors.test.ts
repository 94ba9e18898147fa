import { describe, it, expect } from "vitest";
import { AppError } from "./app-error.js";
import {
  UnsupportedFileTypeError,
  ExtractionError,
  EmptyContentError,
  EmbeddingError,
  FileRoutingError,
  toFailureReason,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with all properties", () => {
    const cause = new Error("root cause");
    const err = new AppError({
      message: "test error",
      code: "INTERNAL",
      stage: "store",
      isOperational: false,
      details: { foo: "bar" },
      cause,
    });

    expect(err.message).toBe("test error");
    expect(err.code).toBe("INTERNAL");
    expect(err.stage).toBe("store");
    expect(err.isOperational).toBe(false);
    expect(err.details).toEqual({ foo: "bar" });
    expect(err.cause).toBe(cause);
    expect(err.name).toBe("AppError");
    expect(err).toBeInstanceOf(Error);
    expect(err).toBeInstanceOf(AppError);
  });

  it("defaults isOperational to true and leaves cause unset", () => {
    const err = new AppError({ message: "test", code: "BAD" });
    expect(err.isOperational).toBe(true);
    expect(err.cause).toBeUndefined();
  });

  it("isAppError detects AppError instances", () => {
    const appErr = new AppError({ message: "test", code: "ERR" });
    const plainErr = new Error("plain");

    expect(AppError.isAppError(appErr)).toBe(true);
    expect(AppError.isAppError(plainErr)).toBe(false);
    expect(AppError.isAppError(null)).toBe(false);
    expect(AppError.isAppError("string")).toBe(false);
  });
});

describe("Error Subclasses", () => {
  describe("UnsupportedFileTypeError", () => {
    it("has UNSUPPORTED_FILE_TYPE code and classify stage", () => {
      const err = new UnsupportedFileTypeError("notes.md", ".md");
      expect(err.code).toBe("UNSUPPORTED_FILE_TYPE");
      expect(err.stage).toBe("classify");
      expect(err.extension).toBe(".md");
      expect(err.message).toBe("Unsupported file type '.md': notes.md");
      expect(err.name).toBe("UnsupportedFileTypeError");
      expect(err).toBeInstanceOf(AppError);
    });

    it("omits the extension when the file has none", () => {
      const err = new UnsupportedFileTypeError("README", "");
      expect(err.message).toBe("Unsupported file type: README");
    });
  });

  describe("ExtractionError", () => {
    it("has EXTRACTION_FAILED code and keeps the file path", () => {
      const err = new ExtractionError("'a.docx' is not a valid DOCX file.", "a.docx");
      expect(err.code).toBe("EXTRACTION_FAILED");
      expect(err.stage).toBe("extract");
      expect(err.filePath).toBe("a.docx");
      expect(err.name).toBe("ExtractionError");
    });
  });

  describe("EmptyContentError", () => {
    it("has EMPTY_CONTENT code", () => {
      const err = new EmptyContentError("empty.pdf");
      expect(err.code).toBe("EMPTY_CONTENT");
      expect(err.message).toBe("Empty text extracted");
      expect(err.filePath).toBe("empty.pdf");
      expect(err.name).toBe("EmptyContentError");
    });
  });

  describe("EmbeddingError", () => {
    it("has EMBEDDING_FAILED code and provider", () => {
      const err = new EmbeddingError("Cohere is down", "cohere");
      expect(err.code).toBe("EMBEDDING_FAILED");
      expect(err.stage).toBe("embed");
      expect(err.provider).toBe("cohere");
      expect(err.name).toBe("EmbeddingError");
    });
  });

  describe("FileRoutingError", () => {
    it("has FILE_ROUTING_FAILED code and destination", () => {
      const err = new FileRoutingError("Destination exists", "/tmp/success/a.txt");
      expect(err.code).toBe("FILE_ROUTING_FAILED");
      expect(err.stage).toBe("route");
      expect(err.destination).toBe("/tmp/success/a.txt");
    });
  });
});

describe("toFailureReason", () => {
  it("returns the message of a plain error", () => {
    expect(toFailureReason(new Error("boom"))).toBe("boom");
  });

  it("appends the cause of an AppError", () => {
    const err = new EmbeddingError("Embedding request failed", "cohere", {
      cause: new Error("401 invalid api token"),
    });
    expect(toFailureReason(err)).toBe("Embedding request failed: 401 invalid api token");
  });

  it("does not repeat a cause with the same message", () => {
    const err = new ExtractionError("bad pdf", "x.pdf", { cause: new Error("bad pdf") });
    expect(toFailureReason(err)).toBe("bad pdf");
  });

  it("stringifies non-error values", () => {
    expect(toFailureReason("plain string")).toBe("plain string");
  });
});
