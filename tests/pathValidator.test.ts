import { describe, it, expect, beforeEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import { validatePath, createPathValidator } from "../src/paths/pathValidator.js";
import { InvalidPathError } from "../src/errors.js";

describe("validatePath", () => {
  let root: string;

  beforeEach(async () => {
    const base = await fs.mkdtemp(path.join(process.env.GFB_TEST_BASE || os.tmpdir(), "paths-"));
    root = await fs.realpath(base);
    await fs.mkdir(path.join(root, "demo"), { recursive: true });
  });

  it("resolves a relative path under the root", async () => {
    const result = await validatePath(root, "demo/example.txt");
    expect(result.relative).toBe("demo/example.txt");
    expect(result.absolute).toBe(path.join(root, "demo", "example.txt"));
  });

  it("normalizes redundant separators and dot segments", async () => {
    const result = await validatePath(root, "demo//./nested\\file.md");
    expect(result.relative).toBe("demo/nested/file.md");
    expect(result.absolute).toBe(path.join(root, "demo", "nested", "file.md"));
  });

  it.each([
    ["../../etc/passwd"],
    ["/etc/passwd"],
    ["a;rm -rf /"],
    ["demo/../../outside.txt"],
    ["~/notes.txt"],
    ["C:\\Windows\\system.ini"],
    ["\\\\server\\share"],
    ["$(whoami).txt"],
    ["a`id`.txt"],
    ["a|b"],
    ["a&b"],
    ["a>b"],
    ["bad\0name"],
    ["line\nbreak"],
    [""],
    ["   "],
    ["./"],
    [".git/config"],
    ["sub/.git/hooks/pre-commit"],
  ])("rejects %j with InvalidPathError", async (raw) => {
    await expect(validatePath(root, raw)).rejects.toBeInstanceOf(InvalidPathError);
  });

  it("allows dots inside a file name", async () => {
    const result = await validatePath(root, "demo/archive..2024.tar");
    expect(result.relative).toBe("demo/archive..2024.tar");
  });

  it("accepts a root-level name that merely starts with two dots", async () => {
    const result = await validatePath(root, "..notes.md");
    expect(result.relative).toBe("..notes.md");
    expect(result.absolute).toBe(path.join(root, "..notes.md"));
  });

  it("rejects a symlink inside the root that points outside", async () => {
    const outside = await fs.mkdtemp(path.join(os.tmpdir(), "gfb-outside-"));
    try {
      await fs.symlink(outside, path.join(root, "escape"));
      await expect(validatePath(root, "escape/secret.txt")).rejects.toThrow(
        "Path outside repository boundaries",
      );
    } finally {
      await fs.rm(outside, { recursive: true, force: true });
    }
  });

  it("accepts a symlink that stays inside the root", async () => {
    await fs.symlink(path.join(root, "demo"), path.join(root, "alias"));
    const result = await validatePath(root, "alias/file.txt");
    expect(result.relative).toBe("alias/file.txt");
  });

  it("does not create anything on disk", async () => {
    await validatePath(root, "fresh/deep/file.txt");
    await expect(fs.stat(path.join(root, "fresh"))).rejects.toThrow();
  });

  it("binds the root through createPathValidator", async () => {
    const validate = createPathValidator(root);
    const result = await validate("demo/a.txt");
    expect(result.absolute).toBe(path.join(root, "demo", "a.txt"));
  });
});
