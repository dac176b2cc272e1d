import { describe, it, expect } from "vitest";
import {
  CallfmtError,
  ValidationError,
  ConfigError,
  TemplateCompileError,
  UnknownPlaceholderError,
  UnterminatedPlaceholderError,
  EmptyPlaceholderNameError,
  UnmatchedClosingMarkerError,
  TemplateRenderError,
  MissingValueError,
  BatchAbortedError,
} from "../../src/lib/errors.js";

describe("Error Classes", () => {
  describe("CallfmtError", () => {
    it("should create a basic error", () => {
      const error = new CallfmtError("Test message", "TEST_CODE");
      expect(error.message).toBe("Test message");
      expect(error.name).toBe("CallfmtError");
      expect(error.code).toBe("TEST_CODE");
      expect(error).toBeInstanceOf(Error);
      expect(error).toBeInstanceOf(CallfmtError);
    });

    it("should have proper stack trace", () => {
      const error = new CallfmtError("Test message", "TEST_CODE");
      expect(error.stack).toBeDefined();
      expect(error.stack).toContain("Test message");
    });

    it("should serialize to JSON", () => {
      const error = new CallfmtError("Test message", "TEST_CODE", { key: "value" });
      expect(error.toJSON()).toEqual({
        name: "CallfmtError",
        code: "TEST_CODE",
        message: "Test message",
        context: { key: "value" },
      });
    });
  });

  describe("ValidationError and ConfigError", () => {
    it("should carry their codes", () => {
      expect(new ValidationError("bad").code).toBe("VALIDATION_ERROR");
      expect(new ConfigError("bad").code).toBe("CONFIG_ERROR");
      expect(new ConfigError("bad")).toBeInstanceOf(CallfmtError);
    });
  });

  describe("compile errors", () => {
    it("should name the unknown placeholder", () => {
      const error = new UnknownPlaceholderError("missing", 3);
      expect(error.message).toBe("Unknown placeholder 'missing'");
      expect(error.code).toBe("UNKNOWN_PLACEHOLDER");
      expect(error.placeholder).toBe("missing");
      expect(error.offset).toBe(3);
      expect(error.context).toEqual({ placeholder: "missing", offset: 3 });
      expect(error).toBeInstanceOf(TemplateCompileError);
    });

    it("should create an unterminated placeholder error", () => {
      const error = new UnterminatedPlaceholderError(0);
      expect(error.message).toBe("Unterminated placeholder");
      expect(error.code).toBe("UNTERMINATED_PLACEHOLDER");
      expect(error.name).toBe("UnterminatedPlaceholderError");
      expect(error).toBeInstanceOf(TemplateCompileError);
    });

    it("should create an empty placeholder name error", () => {
      const error = new EmptyPlaceholderNameError(5);
      expect(error.code).toBe("EMPTY_PLACEHOLDER_NAME");
      expect(error.context).toEqual({ offset: 5 });
    });

    it("should include the stray marker", () => {
      const error = new UnmatchedClosingMarkerError("}", 2);
      expect(error.message).toBe("Unmatched closing marker '}'");
      expect(error.code).toBe("UNMATCHED_CLOSING_MARKER");
      expect(error.context).toEqual({ marker: "}", offset: 2 });
    });
  });

  describe("render errors", () => {
    it("should name the placeholder without data", () => {
      const error = new MissingValueError("artist");
      expect(error.message).toBe("No data for placeholder 'artist'");
      expect(error.code).toBe("MISSING_VALUE");
      expect(error.placeholder).toBe("artist");
      expect(error).toBeInstanceOf(TemplateRenderError);
      expect(error).not.toBeInstanceOf(TemplateCompileError);
    });

    it("should wrap the failing record of a batch", () => {
      const failure = new MissingValueError("a");
      const error = new BatchAbortedError(7, failure);
      expect(error.message).toBe("Batch aborted at record 7: No data for placeholder 'a'");
      expect(error.index).toBe(7);
      expect(error.failure).toBe(failure);
      expect(error.toJSON()).toEqual({
        name: "BatchAbortedError",
        code: "BATCH_ABORTED",
        message: "Batch aborted at record 7: No data for placeholder 'a'",
        context: {
          index: 7,
          failure: {
            name: "MissingValueError",
            code: "MISSING_VALUE",
            message: "No data for placeholder 'a'",
            context: { placeholder: "a" },
          },
        },
      });
    });
  });
});
