#!/usr/bin/env node
// GitHub to GitLab mirror
// Main entry point

export { GitHubClient } from "./api/github-client.js";
export type { SourceHost, SourceRepository } from "./api/github-client.js";
export { GitLabClient } from "./api/gitlab-client.js";
export type { DestinationApi, ResourceResult } from "./api/gitlab-client.js";
export { ensureNamespace } from "./destination/namespace.js";
export { createProject, projectExists, toVisibility } from "./destination/projects.js";
export { MirrorEngine } from "./migration/mirror.js";
export type { Mirrorer, MirrorResult } from "./migration/mirror.js";
export { runSync, printSummary } from "./orchestration/sync-repos.js";
export type { SyncOutcome, SyncReport, SyncSummary } from "./orchestration/sync-repos.js";
export { loadRunConfig, loadCredentials } from "./config/run-config.js";
export type { RunConfig, Credentials } from "./config/run-config.js";

import { realpathSync } from "fs";
import { pathToFileURL } from "url";
import { GitHubClient } from "./api/github-client.js";
import { GitLabClient } from "./api/gitlab-client.js";
import { USAGE, parseCliArgs } from "./cli.js";
import { loadCredentials, loadRunConfig, type RunConfig } from "./config/run-config.js";
import { errorMessage, isFatal } from "./errors.js";
import { logger as defaultLogger, type Logger } from "./logger.js";
import { MirrorEngine, ensureGitInstalled } from "./migration/mirror.js";
import { printSummary, runSync } from "./orchestration/sync-repos.js";

function printBanner(config: RunConfig, log: Logger): void {
  log.plain("=========================================");
  log.plain("  GitHub -> GitLab Repository Sync");
  log.plain("=========================================");
  log.plain("");

  if (config.dryRun) {
    log.warn("Running in DRY RUN mode - no changes will be made");
    log.plain("");
  }

  log.info("Configuration:");
  log.plain(`  GitLab Host: ${config.gitlabHost}`);
  log.plain(`  GitLab Group: ${config.gitlabGroup}`);
  log.plain(`  GitHub User: ${config.githubUser ?? "(authenticated user)"}`);
  log.plain(`  Include Forks: ${config.includeForks}`);
  log.plain(`  Include Archived: ${config.includeArchived}`);
  log.plain(`  Protocol: ${config.protocol}`);
  log.plain(`  Work Directory: ${config.workDir}`);
  log.plain("");
}

/**
 * Runs one sync and returns the process exit code: 1 for any fatal error, or
 * for per-repository failures when `failOnError` is set; 0 otherwise.
 */
export async function main(
  argv: string[] = process.argv.slice(2),
  env: Record<string, string | undefined> = process.env,
  log: Logger = defaultLogger
): Promise<number> {
  let cli: ReturnType<typeof parseCliArgs>;
  try {
    cli = parseCliArgs(argv);
  } catch (error) {
    log.error(errorMessage(error));
    log.plain(USAGE);
    return 1;
  }
  if (cli.help) {
    log.plain(USAGE);
    return 0;
  }

  try {
    const config = loadRunConfig(cli.flags, env);
    printBanner(config, log);

    await ensureGitInstalled();
    const credentials = loadCredentials(config, env);

    const report = await runSync(config, {
      source: new GitHubClient({
        token: credentials.githubToken,
        protocol: config.protocol,
        limit: config.repositoryLimit,
        logger: log,
      }),
      destination: new GitLabClient({ token: credentials.gitlabToken, host: config.gitlabHost }),
      mirror: new MirrorEngine({
        workDir: config.workDir,
        remoteName: config.remoteName,
        dryRun: config.dryRun,
        logger: log,
      }),
      credentials,
      logger: log,
    });

    printSummary(report, log);
    log.success("Sync complete!");

    return config.failOnError && report.summary.failed > 0 ? 1 : 0;
  } catch (error) {
    if (isFatal(error)) {
      log.error(error.message);
      if (error.hint) {
        log.plain(`  ${error.hint}`);
      }
      return 1;
    }
    log.error(`Fatal error: ${errorMessage(error)}`);
    return 1;
  }
}

function isMainModule(): boolean {
  const entry = process.argv[1];
  if (!entry) return false;
  try {
    return import.meta.url === pathToFileURL(realpathSync(entry)).href;
  } catch {
    return false;
  }
}

if (isMainModule()) {
  main().then(
    (code) => process.exit(code),
    (error) => {
      console.error("Fatal error:", error);
      process.exit(1);
    }
  );
}
