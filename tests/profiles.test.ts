import { describe, it, expect, beforeEach } from "vitest";
import fs from "fs/promises";
import path from "path";
import os from "os";
import { activateProfile, listProfiles } from "../src/profiles.js";
import { NotFoundError } from "../src/errors.js";

const work = { name: "work", repo: "acme/work", token: "", local_folder: "work_repo" };
const personal = { name: "personal", repo: "me/notes", token: "", local_folder: "notes_repo" };

describe("profiles", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(process.env.GFB_TEST_BASE || os.tmpdir(), "profiles-"));
    await fs.writeFile(path.join(dir, "active.json"), JSON.stringify(work));
    await fs.writeFile(path.join(dir, "work.json"), JSON.stringify(work));
    await fs.writeFile(path.join(dir, "personal.json"), JSON.stringify(personal));
    await fs.writeFile(path.join(dir, "broken.json"), "not json");
    await fs.writeFile(path.join(dir, "README.txt"), "ignored");
  });

  it("lists each named profile once, sorted", async () => {
    expect(await listProfiles(dir)).toEqual(["personal", "work"]);
  });

  it("returns an empty list for a missing directory", async () => {
    expect(await listProfiles(path.join(dir, "nope"))).toEqual([]);
  });

  it("activates a profile and keeps a backup of the previous one", async () => {
    const result = await activateProfile(dir, "personal");

    expect(result).toEqual({ name: "personal", source: path.join(dir, "personal.json") });
    expect(JSON.parse(await fs.readFile(path.join(dir, "active.json"), "utf8"))).toEqual(personal);
    expect(JSON.parse(await fs.readFile(path.join(dir, "active.bak"), "utf8"))).toEqual(work);
  });

  it("activates even when no profile was active before", async () => {
    await fs.rm(path.join(dir, "active.json"));
    await activateProfile(dir, "work");
    expect(JSON.parse(await fs.readFile(path.join(dir, "active.json"), "utf8"))).toEqual(work);
  });

  it("rejects unknown profile names", async () => {
    const err = await activateProfile(dir, "ghost").catch((e: unknown) => e);
    expect(err).toBeInstanceOf(NotFoundError);
    expect(err).toMatchObject({ message: "Profile not found" });
  });
});
