import { describe, expect, it } from "vitest";
import { slugify, uniqueSlug } from "./slug";

describe("slugify", () => {
  it("lowercases and hyphenates", () => {
    expect(slugify("  Fresh Fruits & Vegetables ")).toBe("fresh-fruits-vegetables");
  });

  it("strips accents", () => {
    expect(slugify("Crème Brûlée")).toBe("creme-brulee");
  });
});

describe("uniqueSlug", () => {
  it("adds a numeric suffix until the slug is free", async () => {
    const taken = new Set(["green-grocer", "green-grocer-2"]);
    await expect(uniqueSlug("Green Grocer", async (slug) => taken.has(slug))).resolves.toBe(
      "green-grocer-3"
    );
  });

  it("falls back to a generic base for names without letters", async () => {
    await expect(uniqueSlug("!!!", async () => false)).resolves.toBe("item");
  });
});
