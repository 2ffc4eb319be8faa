/**
 * InvoiceVerifier – Validator unit tests
 */

import { validateOptions, InvoiceVerifierError } from "../core/validator";

describe("validateOptions", () => {
  it("passes with no options", () => {
    expect(validateOptions({})).toEqual({ valid: true, errors: [] });
  });

  it("passes with a directory and a language spec", () => {
    const { valid } = validateOptions({
      directory: "images",
      language: "spa+eng",
    });
    expect(valid).toBe(true);
  });

  it("fails on an empty directory", () => {
    const { valid, errors } = validateOptions({ directory: "  " });
    expect(valid).toBe(false);
    expect(errors).toEqual(["`directory` must be a non-empty path."]);
  });

  it("fails on a malformed language spec", () => {
    const { valid, errors } = validateOptions({ language: "spa eng" });
    expect(valid).toBe(false);
    expect(errors.some((e) => e.includes("`language`"))).toBe(true);
  });

  it("accepts underscored Tesseract codes", () => {
    expect(validateOptions({ language: "chi_sim+eng" }).valid).toBe(true);
  });

  it("fails on a blank provider name", () => {
    const { errors } = validateOptions({ ocrProvider: "" });
    expect(errors).toEqual(["`ocrProvider` must be a non-empty provider name."]);
  });

  it("collects every error", () => {
    const { errors } = validateOptions({
      directory: "",
      language: "??",
      ocrProvider: " ",
    });
    expect(errors).toHaveLength(3);
  });
});

describe("InvoiceVerifierError", () => {
  it("carries a code and a cause", () => {
    const cause = new Error("disk");
    const err = new InvoiceVerifierError("failed", "OCR_FAILED", cause);
    expect(err.name).toBe("InvoiceVerifierError");
    expect(err.message).toBe("failed");
    expect(err.code).toBe("OCR_FAILED");
    expect(err.cause).toBe(cause);
    expect(err).toBeInstanceOf(Error);
  });
});
