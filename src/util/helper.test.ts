import { describe, expect, it } from "vitest";
import { prefixPath } from "./helper.js";

describe("prefixPath", () => {
  it("puts relative paths under the directory once", () => {
    expect(prefixPath("output", "seed.sql")).toBe("output/seed.sql");
    expect(prefixPath("output", "output/seed.sql")).toBe("output/seed.sql");
    expect(prefixPath("output", "/tmp/seed.sql")).toBe("/tmp/seed.sql");
  });

  it("treats empty and '-' as stdout", () => {
    expect(prefixPath("output")).toBeUndefined();
    expect(prefixPath("output", "")).toBeUndefined();
    expect(prefixPath("output", "-")).toBeUndefined();
  });
});
