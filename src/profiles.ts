import fs from "fs";
import fsp from "fs/promises";
import path from "path";
import { z } from "zod";
import { NotFoundError, errorMessage } from "./errors.js";

export const ACTIVE_PROFILE_FILE = "active.json";
export const PROFILE_BACKUP_FILE = "active.bak";

export const profileSchema = z.object({
  name: z.string().min(1).optional(),
  repo: z.string().min(1, "repo must be owner/name"),
  token: z.string(),
  local_folder: z.string().min(1),
  safe_mode: z.boolean().optional(),
  branch: z.string().min(1).optional(),
  remote_url: z.string().min(1).optional(),
});

export type Profile = z.infer<typeof profileSchema>;

export type ProfileLoad =
  | { profile: Profile; error?: undefined }
  | { profile: null; error: string };

export function loadActiveProfile(profilesDir: string): ProfileLoad {
  const file = path.join(profilesDir, ACTIVE_PROFILE_FILE);
  if (!fs.existsSync(file)) {
    return { profile: null, error: `Missing profile: ${file}` };
  }
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (e) {
    return { profile: null, error: `Invalid JSON in profile: ${errorMessage(e)}` };
  }
  const parsed = profileSchema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((i) => i.path.join(".") || "(root)");
    return {
      profile: null,
      error: `Profile invalid or missing keys: ${fields.join(", ")}`,
    };
  }
  return { profile: parsed.data };
}

async function readProfileName(file: string): Promise<string | null> {
  try {
    const raw: unknown = JSON.parse(await fsp.readFile(file, "utf8"));
    const named = z.object({ name: z.string().min(1) }).safeParse(raw);
    return named.success ? named.data.name : null;
  } catch {
    return null;
  }
}

async function profileFiles(profilesDir: string): Promise<string[]> {
  let entries: string[];
  try {
    entries = await fsp.readdir(profilesDir);
  } catch {
    return [];
  }
  return entries
    .filter((e) => e.toLowerCase().endsWith(".json"))
    .sort()
    .map((e) => path.join(profilesDir, e));
}

export async function listProfiles(profilesDir: string): Promise<string[]> {
  const names = new Set<string>();
  for (const file of await profileFiles(profilesDir)) {
    const name = await readProfileName(file);
    if (name) names.add(name);
  }
  return [...names].sort();
}

/**
 * Copies the named profile over `active.json`, keeping the previous one as
 * `active.bak`. The running process keeps its configuration until restart.
 */
export async function activateProfile(profilesDir: string, name: string) {
  const activePath = path.join(profilesDir, ACTIVE_PROFILE_FILE);
  let target: string | null = null;
  for (const file of await profileFiles(profilesDir)) {
    if (path.basename(file) === ACTIVE_PROFILE_FILE) continue;
    if ((await readProfileName(file)) === name) {
      target = file;
      break;
    }
  }
  if (!target) throw new NotFoundError("Profile not found");

  try {
    await fsp.copyFile(activePath, path.join(profilesDir, PROFILE_BACKUP_FILE));
  } catch (e) {
    if (fs.existsSync(activePath)) throw e;
  }
  await fsp.copyFile(target, activePath);
  return { name, source: target };
}
