import { describe, it, expect } from "vitest";
import { extensionsFor, repairExtension } from "./guess-extension";

describe("extensionsFor", () => {
  it("ignores parameters and case", () => {
    expect(extensionsFor("Image/PNG; charset=binary")).toEqual([".png"]);
  });

  it("returns nothing for unknown or missing types", () => {
    expect(extensionsFor("text/html")).toEqual([]);
    expect(extensionsFor(null)).toEqual([]);
  });
});

describe("repairExtension", () => {
  it("keeps a matching extension", () => {
    expect(repairExtension("x.png", "image/png")).toBe("x.png");
    expect(repairExtension("x.JPEG", "image/jpeg")).toBe("x.JPEG");
  });

  it("appends the preferred extension when missing", () => {
    expect(repairExtension("img%2Fraw--id%3D7", "image/jpeg")).toBe(
      "img%2Fraw--id%3D7.jpg",
    );
  });

  it("appends when the suffix does not match the type", () => {
    expect(repairExtension("x.png", "image/webp")).toBe("x.png.webp");
  });

  it("leaves the name alone when the type is unknown", () => {
    expect(repairExtension("x", "application/octet-stream")).toBe("x");
    expect(repairExtension("x", null)).toBe("x");
  });
});
