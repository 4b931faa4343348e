import fs from "fs/promises";
import os from "os";
import path from "path";

/** Produces the secret for the remote on demand. Never logged. */
export type CredentialProvider = () => Promise<string>;

export const ASKPASS_USERNAME = "x-access-token";

export function staticCredentials(token: string): CredentialProvider | undefined {
  if (!token) return undefined;
  return async () => token;
}

function askPassScript(secretFile: string) {
  const quoted = `'${secretFile.replace(/'/g, `'\\''`)}'`;
  return [
    "#!/bin/sh",
    'case "$1" in',
    `  Username*) echo "${ASKPASS_USERNAME}" ;;`,
    `  *) cat ${quoted} ;;`,
    "esac",
    "",
  ].join("\n");
}

/**
 * Runs `fn` with an environment whose GIT_ASKPASS points at a throwaway helper.
 * The secret sits in a 0600 file inside a private temp directory that is
 * removed once `fn` settles; only the helper's path enters the environment.
 */
export async function withAskPass<T>(
  provider: CredentialProvider | undefined,
  fn: (env: Record<string, string>) => Promise<T>,
): Promise<T> {
  if (!provider) return fn({});

  const dir = await fs.mkdtemp(path.join(os.tmpdir(), "gfb-askpass-"));
  try {
    await fs.chmod(dir, 0o700);
    const secretFile = path.join(dir, "secret");
    const helper = path.join(dir, "askpass.sh");
    await fs.writeFile(secretFile, await provider(), { mode: 0o600 });
    await fs.writeFile(helper, askPassScript(secretFile), { mode: 0o700 });
    return await fn({ GIT_ASKPASS: helper, GIT_TERMINAL_PROMPT: "0" });
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
