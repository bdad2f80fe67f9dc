/**
 * Tests for validity interval checks
 */

import { ValidationError } from "@otptoken/common";
import {
  checkInterval,
  validateCreateInterval,
  validateUpdateInterval,
} from "./interval";

const T1 = new Date("2026-01-01T00:00:00Z");
const T2 = new Date("2026-06-01T00:00:00Z");
const T3 = new Date("2026-09-01T00:00:00Z");
const T0 = new Date("2025-06-01T00:00:00Z");

describe("checkInterval", () => {
  it("should accept ordered and equal bounds", () => {
    expect(checkInterval(T1, T2)).toBe(true);
    expect(checkInterval(T1, new Date(T1.getTime()))).toBe(true);
  });

  it("should reject reversed bounds", () => {
    expect(checkInterval(T2, T1)).toBe(false);
  });

  it("should accept a missing bound", () => {
    expect(checkInterval(T2, undefined)).toBe(true);
    expect(checkInterval(null, T1)).toBe(true);
    expect(checkInterval()).toBe(true);
  });
});

describe("validateCreateInterval", () => {
  it("should name notAfter on violation", () => {
    expect(() => validateCreateInterval({ notBefore: T2, notAfter: T1 })).toThrow(
      new ValidationError("notAfter", "is before the validity start"),
    );
  });

  it("should pass with one bound", () => {
    expect(() => validateCreateInterval({ notAfter: T1 })).not.toThrow();
  });
});

describe("validateUpdateInterval", () => {
  const stored = { notBefore: T1, notAfter: T2 };

  it("should check a new notAfter against the stored notBefore", async () => {
    const readStored = vi.fn(async () => stored);

    await expect(
      validateUpdateInterval({ notAfter: T3 }, readStored),
    ).resolves.toBeUndefined();
    expect(readStored).toHaveBeenCalledTimes(1);

    await expect(
      validateUpdateInterval({ notAfter: T0 }, readStored),
    ).rejects.toMatchObject({ field: "notAfter", error: "is before the validity start" });
  });

  it("should check a new notBefore against the stored notAfter", async () => {
    await expect(
      validateUpdateInterval({ notBefore: T3 }, async () => stored),
    ).rejects.toMatchObject({ field: "notBefore", error: "is after the validity end" });
  });

  it("should ignore stored values when both bounds are given", async () => {
    const readStored = vi.fn(async () => stored);

    await validateUpdateInterval({ notBefore: T0, notAfter: T0 }, readStored);
    expect(readStored).not.toHaveBeenCalled();

    await expect(
      validateUpdateInterval({ notBefore: T3, notAfter: T0 }, readStored),
    ).rejects.toMatchObject({ field: "notAfter" });
  });

  it("should not read the store when no bound is given", async () => {
    const readStored = vi.fn(async () => stored);
    await validateUpdateInterval({}, readStored);
    expect(readStored).not.toHaveBeenCalled();
  });

  it("should treat a cleared bound as given", async () => {
    const readStored = vi.fn(async () => stored);
    await validateUpdateInterval({ notBefore: null, notAfter: T0 }, readStored);
    expect(readStored).not.toHaveBeenCalled();
  });

  it("should pass when the stored counterpart is missing", async () => {
    await expect(
      validateUpdateInterval({ notBefore: T3 }, async () => ({})),
    ).resolves.toBeUndefined();
  });
});
