import { simpleGit } from "simple-git";

export async function resolveRevision(cwd: string = process.cwd()): Promise<string> {
  const git = simpleGit({ baseDir: cwd });
  const revision = (await git.revparse(["HEAD"])).trim();
  if (!revision) {
    throw new Error(`Unable to resolve HEAD in ${cwd}`);
  }
  return revision;
}

/**
 * Current branch as a full ref (`refs/heads/main`), or undefined on a
 * detached HEAD.
 */
export async function resolveBranchRef(cwd: string = process.cwd()): Promise<string | undefined> {
  const git = simpleGit({ baseDir: cwd });
  const branch = (await git.revparse(["--abbrev-ref", "HEAD"])).trim();
  if (!branch || branch === "HEAD") {
    return undefined;
  }
  return `refs/heads/${branch}`;
}
