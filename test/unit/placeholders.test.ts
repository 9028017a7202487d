import { describe, test, expect } from "vitest";
import {
  extractPlaceholders,
  placeholdersPreserved,
} from "../../src/utils/placeholders";

describe("Placeholders", () => {
  test("should extract placeholders in sorted order", () => {
    expect(extractPlaceholders("%{b} and %{a} and %{b}")).toEqual([
      "%{a}",
      "%{b}",
      "%{b}",
    ]);
    expect(extractPlaceholders("no placeholders, 100%")).toEqual([]);
  });

  test("should accept reordered placeholders", () => {
    expect(
      placeholdersPreserved("%{count} files in %{dir}", "In %{dir}: %{count}")
    ).toBe(true);
  });

  test("should reject renamed, dropped or duplicated placeholders", () => {
    expect(placeholdersPreserved("Hi %{name}", "Hallo %{Name}")).toBe(false);
    expect(placeholdersPreserved("Hi %{name}", "Hallo")).toBe(false);
    expect(placeholdersPreserved("Hi %{name}", "%{name} %{name}")).toBe(false);
  });
});
