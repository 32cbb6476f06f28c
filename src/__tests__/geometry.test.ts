import { describe, it, expect } from "vitest";
import path from "node:path";
import { computeTargetDimensions, generateOutputPath, orientedDimensions } from "../geometry.js";

const noResize = { resizePercent: 0, resizeWidth: 0, resizeHeight: 0 };
const source = { width: 800, height: 600 };

describe("computeTargetDimensions", () => {
  it("scales both axes by a percent", () => {
    expect(computeTargetDimensions(source, { ...noResize, resizePercent: 50 })).toEqual({ width: 400, height: 300 });
  });

  it("prefers the percent over explicit dimensions", () => {
    const target = computeTargetDimensions(source, { resizePercent: 50, resizeWidth: 1000, resizeHeight: 0 });
    expect(target).toEqual({ width: 400, height: 300 });
  });

  it("keeps the aspect ratio when only the width is set", () => {
    expect(computeTargetDimensions(source, { ...noResize, resizeWidth: 400 })).toEqual({ width: 400, height: 300 });
  });

  it("keeps the aspect ratio when only the height is set", () => {
    expect(computeTargetDimensions(source, { ...noResize, resizeHeight: 300 })).toEqual({ width: 400, height: 300 });
  });

  it("uses both dimensions exactly when both are set", () => {
    expect(computeTargetDimensions(source, { ...noResize, resizeWidth: 1000, resizeHeight: 200 })).toEqual({
      width: 1000,
      height: 200,
    });
  });

  it("falls through to dimensions when the percent is 100 or more", () => {
    expect(computeTargetDimensions(source, { resizePercent: 100, resizeWidth: 400, resizeHeight: 0 })).toEqual({
      width: 400,
      height: 300,
    });
    expect(computeTargetDimensions(source, { ...noResize, resizePercent: 150 })).toEqual(source);
  });

  it("leaves the size alone when nothing is set", () => {
    expect(computeTargetDimensions(source, noResize)).toEqual({ width: 800, height: 600 });
  });

  it("floors fractional results", () => {
    expect(computeTargetDimensions(source, { ...noResize, resizePercent: 33.3 })).toEqual({ width: 266, height: 199 });
    expect(computeTargetDimensions({ width: 3, height: 7 }, { ...noResize, resizeWidth: 2 })).toEqual({
      width: 2,
      height: 4,
    });
  });

  it("never produces a zero-pixel axis", () => {
    expect(computeTargetDimensions({ width: 1000, height: 1 }, { ...noResize, resizePercent: 50 })).toEqual({
      width: 500,
      height: 1,
    });
    expect(computeTargetDimensions({ width: 1000, height: 3 }, { ...noResize, resizeWidth: 10 })).toEqual({
      width: 10,
      height: 1,
    });
    expect(computeTargetDimensions({ width: 2, height: 1000 }, { ...noResize, resizeHeight: 100 })).toEqual({
      width: 1,
      height: 100,
    });
  });

  it("rejects an empty source", () => {
    expect(() => computeTargetDimensions({ width: 0, height: 600 }, { ...noResize, resizeHeight: 300 })).toThrow(RangeError);
  });
});

describe("orientedDimensions", () => {
  it("swaps axes for rotated orientations", () => {
    expect(orientedDimensions(40, 20, 6)).toEqual({ width: 20, height: 40 });
    expect(orientedDimensions(40, 20, 8)).toEqual({ width: 20, height: 40 });
  });

  it("keeps axes for upright or mirrored orientations", () => {
    expect(orientedDimensions(40, 20, 1)).toEqual({ width: 40, height: 20 });
    expect(orientedDimensions(40, 20, 3)).toEqual({ width: 40, height: 20 });
    expect(orientedDimensions(40, 20)).toEqual({ width: 40, height: 20 });
  });
});

describe("generateOutputPath", () => {
  const defaults = { outputDir: "", outputSuffix: "_compressed" };

  it("writes next to the input by default", () => {
    expect(generateOutputPath("/photos/cat.JPG", defaults)).toBe(path.join("/photos", "cat_compressed.JPG"));
  });

  it("uses the output directory when set", () => {
    expect(generateOutputPath("/photos/cat.png", { ...defaults, outputDir: "/out" })).toBe(
      path.join("/out", "cat_compressed.png"),
    );
  });

  it("only treats the last extension as the extension", () => {
    expect(generateOutputPath("/a/archive.tar.png", { outputDir: "", outputSuffix: "_small" })).toBe(
      path.join("/a", "archive.tar_small.png"),
    );
  });

  it("keeps relative paths relative", () => {
    expect(generateOutputPath("img/a.png", defaults)).toBe(path.join("img", "a_compressed.png"));
    expect(generateOutputPath("a.png", defaults)).toBe("a_compressed.png");
  });

  it("returns the same path for the same input", () => {
    const options = { outputDir: "/out", outputSuffix: "-min" };
    const first = generateOutputPath("/in/photo.jpeg", options);
    const second = generateOutputPath("/in/photo.jpeg", options);
    expect(second).toBe(first);
    expect(first).toBe(path.join("/out", "photo-min.jpeg"));
  });
});
