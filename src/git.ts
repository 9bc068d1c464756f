import { execa } from "execa";

export async function isInsideWorkTree(): Promise<boolean> {
  try {
    const { stdout } = await execa("git", ["rev-parse", "--is-inside-work-tree"]);
    return stdout.trim() === "true";
  } catch {
    // git exits non-zero outside a repository
    return false;
  }
}

export async function commitWithMessage(message: string): Promise<void> {
  await execa("git", ["commit", "-m", message]);
}
