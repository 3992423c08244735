import { CheckRepoActions, simpleGit } from "simple-git";
import { existsSync } from "fs";
import { mkdir, rm } from "fs/promises";
import { join } from "path";
import { MirrorError, MissingDependencyError, errorMessage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { redactUrl } from "./endpoints.js";

export type MirrorResult =
  | { success: true; action: "cloned" | "updated" | "dry-run" }
  | { success: false; error: MirrorError };

/** Transfers one repository's full history from source to destination. */
export interface Mirrorer {
  mirror(
    name: string,
    sourceCloneEndpoint: string,
    destinationPushEndpoint: string
  ): Promise<MirrorResult>;
}

export interface MirrorEngineOptions {
  workDir: string;
  remoteName: string;
  dryRun: boolean;
  logger?: Logger;
}

const SOURCE_REMOTE = "origin";

export async function ensureGitInstalled(): Promise<void> {
  const { installed } = await simpleGit().version();
  if (!installed) {
    throw new MissingDependencyError("Missing dependencies: git", {
      hint: "Install git and make sure it is on PATH.",
    });
  }
}

/**
 * Keeps one bare mirror clone per repository under `workDir` and pushes it to
 * the destination with `--mirror`. The local clones are a cache that survives
 * between runs; a failed run leaves them in place for the next refresh.
 */
export class MirrorEngine implements Mirrorer {
  private workDir: string;
  private remoteName: string;
  private dryRun: boolean;
  private logger: Logger;

  constructor(options: MirrorEngineOptions) {
    this.workDir = options.workDir;
    this.remoteName = options.remoteName;
    this.dryRun = options.dryRun;
    this.logger = options.logger ?? defaultLogger;
  }

  localPath(name: string): string {
    return join(this.workDir, `${name}.git`);
  }

  async mirror(
    name: string,
    sourceCloneEndpoint: string,
    destinationPushEndpoint: string
  ): Promise<MirrorResult> {
    this.logger.info(`Mirroring: ${name}`);

    if (this.dryRun) {
      this.logger.info(
        `[DRY RUN] Would mirror ${redactUrl(sourceCloneEndpoint)} -> ${redactUrl(destinationPushEndpoint)}`
      );
      return { success: true, action: "dry-run" };
    }

    if (!isPlainName(name)) {
      return {
        success: false,
        error: new MirrorError(`Refusing to mirror '${name}': not a plain repository name`),
      };
    }

    const repoDir = this.localPath(name);
    let action: "cloned" | "updated";

    try {
      action = await this.acquire(name, repoDir, sourceCloneEndpoint);
    } catch (error) {
      return this.failure(`Failed to fetch ${name} from source`, error);
    }

    try {
      await bindRemote(repoDir, this.remoteName, destinationPushEndpoint);
    } catch (error) {
      return this.failure(`Failed to configure remote '${this.remoteName}' for ${name}`, error);
    }

    this.logger.info("Pushing to GitLab...");
    try {
      await simpleGit(repoDir).push(["--mirror", this.remoteName]);
    } catch (error) {
      return this.failure(`Failed to push ${name} to GitLab`, error);
    }

    this.logger.success(`Successfully mirrored ${name}`);
    return { success: true, action };
  }

  private async acquire(
    name: string,
    repoDir: string,
    sourceCloneEndpoint: string
  ): Promise<"cloned" | "updated"> {
    if (existsSync(repoDir)) {
      if (await simpleGit(repoDir).checkIsRepo(CheckRepoActions.BARE)) {
        this.logger.info(`Updating existing mirror for ${name}...`);
        await bindRemote(repoDir, SOURCE_REMOTE, sourceCloneEndpoint);
        // Only the source is fetched: the destination remote's refs must not be pushed back
        await simpleGit(repoDir).fetch(["--prune", SOURCE_REMOTE]);
        return "updated";
      }

      // Left behind by an interrupted clone
      this.logger.warn(`Discarding incomplete mirror at ${repoDir}`);
      await rm(repoDir, { recursive: true, force: true });
    }

    this.logger.info(`Creating new mirror for ${name}...`);
    await mkdir(this.workDir, { recursive: true });
    await simpleGit(this.workDir).clone(sourceCloneEndpoint, repoDir, ["--mirror"]);
    return "cloned";
  }

  private failure(context: string, error: unknown): MirrorResult {
    const message = redactUrl(`${context}: ${errorMessage(error)}`);
    this.logger.error(message);
    return { success: false, error: new MirrorError(message) };
  }
}

/** Adds the remote, or points it at `url` when it already exists with another URL. */
async function bindRemote(repoDir: string, remoteName: string, url: string): Promise<void> {
  const repoGit = simpleGit(repoDir);
  const remotes = await repoGit.getRemotes(true);
  const existing = remotes.find((remote) => remote.name === remoteName);

  if (!existing) {
    await repoGit.addRemote(remoteName, url);
  } else if (existing.refs.push !== url || existing.refs.fetch !== url) {
    await repoGit.remote(["set-url", remoteName, url]);
  }
}

function isPlainName(name: string): boolean {
  return name !== "" && name !== "." && name !== ".." && !/[\\/]/.test(name);
}
