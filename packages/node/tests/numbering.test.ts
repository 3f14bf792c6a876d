/**
 * Tests for document numbering.
 */

import { describe, it, expect } from "vitest";
import { formatDocumentNumber } from "../src/services/numbering.js";

describe("formatDocumentNumber", () => {
  it("formats PREFIX/YYYYMMDD/NNN", () => {
    expect(formatDocumentNumber("CT", "2025-03-10", 7)).toBe("CT/20250310/007");
    expect(formatDocumentNumber("BT", "2025-12-31", 42)).toBe("BT/20251231/042");
  });

  it("uses only the date part of a timestamp", () => {
    expect(formatDocumentNumber("CT", "2025-03-10T09:00:00.000Z", 1)).toBe("CT/20250310/001");
  });

  it("grows past three digits", () => {
    expect(formatDocumentNumber("CT", "2025-03-10", 1000)).toBe("CT/20250310/1000");
  });

  it("starts at 1", () => {
    expect(formatDocumentNumber("CT", "2025-03-10", 0)).toBe("CT/20250310/001");
  });
});
