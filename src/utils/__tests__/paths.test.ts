import * as path from "path";

import { describe, expect, it } from "vitest";

import { isInsideMetadataDir, matchesIgnoreSubstring, resolveEventPath } from "../paths";

const REPO = path.resolve("/work/repo");

describe("resolveEventPath", () => {
  it("should resolve relative paths against the repository", () => {
    expect(resolveEventPath(REPO, "src/a.ts")).toBe(path.join(REPO, "src", "a.ts"));
  });

  it("should keep absolute paths", () => {
    expect(resolveEventPath(REPO, path.join(REPO, "b.ts"))).toBe(path.join(REPO, "b.ts"));
  });
});

describe("isInsideMetadataDir", () => {
  it("should match the .git entry and its contents", () => {
    expect(isInsideMetadataDir(REPO, path.join(REPO, ".git"))).toBe(true);
    expect(isInsideMetadataDir(REPO, path.join(REPO, ".git", "objects", "ab"))).toBe(true);
  });

  it("should match nested checkouts", () => {
    expect(isInsideMetadataDir(REPO, path.join(REPO, "vendor", "dep", ".git", "HEAD"))).toBe(true);
  });

  it("should not match the repository root itself", () => {
    expect(isInsideMetadataDir(REPO, REPO)).toBe(false);
  });

  it("should not match look-alike names", () => {
    expect(isInsideMetadataDir(REPO, path.join(REPO, ".gitignore"))).toBe(false);
    expect(isInsideMetadataDir(REPO, path.join(REPO, "docs", "my.git", "x"))).toBe(false);
  });
});

describe("matchesIgnoreSubstring", () => {
  it("should match any configured substring", () => {
    expect(matchesIgnoreSubstring("/work/repo/build/out.js", ["dist", "build/"])).toBe(true);
  });

  it("should skip empty patterns", () => {
    expect(matchesIgnoreSubstring("/work/repo/a.txt", [""])).toBe(false);
  });

  it("should not match when no pattern is contained", () => {
    expect(matchesIgnoreSubstring("/work/repo/a.txt", ["node_modules"])).toBe(false);
  });
});
