import { describe, it, expect } from "vitest";
import {
  AppError,
  ConfigurationError,
  ExternalServiceError,
  ValidationError,
} from "./errors.js";

describe("AppError", () => {
  it("creates error with default values", () => {
    const error = new AppError("Something went wrong");

    expect(error.message).toBe("Something went wrong");
    expect(error.code).toBe("INTERNAL_ERROR");
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(true);
    expect(error.context).toBeUndefined();
    expect(error.name).toBe("AppError");
  });

  it("keeps custom options and cause", () => {
    const cause = new Error("root");
    const error = new AppError("Custom", {
      code: "CUSTOM",
      statusCode: 418,
      isOperational: false,
      cause,
      context: { category: "joy" },
    });

    expect(error.code).toBe("CUSTOM");
    expect(error.statusCode).toBe(418);
    expect(error.isOperational).toBe(false);
    expect(error.cause).toBe(cause);
    expect(error.context).toEqual({ category: "joy" });
  });

  it("serializes to JSON without an absent context", () => {
    expect(new AppError("x").toJSON()).toEqual({
      name: "AppError",
      message: "x",
      code: "INTERNAL_ERROR",
      statusCode: 500,
      isOperational: true,
    });
  });

  it("includes context in JSON when present", () => {
    const json = new AppError("x", { context: { field: "tips" } }).toJSON();
    expect(json.context).toEqual({ field: "tips" });
  });
});

describe("ValidationError", () => {
  it("uses 400 and VALIDATION_ERROR by default", () => {
    const error = new ValidationError();

    expect(error.message).toBe("Validation failed");
    expect(error.code).toBe("VALIDATION_ERROR");
    expect(error.statusCode).toBe(400);
    expect(error.name).toBe("ValidationError");
    expect(error).toBeInstanceOf(AppError);
    expect(error).toBeInstanceOf(Error);
  });

  it("accepts a custom code and context", () => {
    const error = new ValidationError("Template list is empty", {
      code: "EMPTY_TEMPLATES",
      context: { category: "fear" },
    });

    expect(error.code).toBe("EMPTY_TEMPLATES");
    expect(error.context).toEqual({ category: "fear" });
  });
});

describe("ConfigurationError", () => {
  it("is non-operational", () => {
    const error = new ConfigurationError("Bad CLASSIFIER_TIMEOUT_MS");

    expect(error.code).toBe("CONFIGURATION_ERROR");
    expect(error.statusCode).toBe(500);
    expect(error.isOperational).toBe(false);
    expect(error.name).toBe("ConfigurationError");
  });
});

describe("ExternalServiceError", () => {
  it("uses 502 and EXTERNAL_SERVICE_ERROR by default", () => {
    const error = new ExternalServiceError();

    expect(error.message).toBe("External service failure");
    expect(error.code).toBe("EXTERNAL_SERVICE_ERROR");
    expect(error.statusCode).toBe(502);
    expect(error.isOperational).toBe(true);
  });
});
