import { setTimeout as delay } from "timers/promises";
import type { SourceHost, SourceRepository } from "../api/github-client.js";
import type { DestinationApi } from "../api/gitlab-client.js";
import type { Credentials, RunConfig } from "../config/run-config.js";
import { ensureNamespace } from "../destination/namespace.js";
import { createProject, projectExists } from "../destination/projects.js";
import { errorMessage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { destinationPushUrl, redactUrl, sourceFetchUrl } from "../migration/endpoints.js";
import type { Mirrorer } from "../migration/mirror.js";

export type SyncOutcome =
  | { status: "synced" }
  | { status: "skipped"; reason: string }
  | { status: "failed"; reason: string };

export interface SyncSummary {
  total: number;
  synced: number;
  skipped: number;
  failed: number;
}

export interface SyncReport {
  summary: SyncSummary;
  outcomes: Array<{ name: string; outcome: SyncOutcome }>;
}

export interface SyncDependencies {
  source: SourceHost;
  destination: DestinationApi;
  mirror: Mirrorer;
  credentials: Credentials;
  logger?: Logger;
  sleep?: (ms: number) => Promise<void>;
}

/** Returns the skip reason for a repository the run's filters exclude. */
export function skipReason(
  repo: Pick<SourceRepository, "isFork" | "isArchived">,
  config: Pick<RunConfig, "includeForks" | "includeArchived">
): string | undefined {
  if (repo.isFork && !config.includeForks) return "fork";
  if (repo.isArchived && !config.includeArchived) return "archived";
  return undefined;
}

export function summarize(outcomes: SyncReport["outcomes"]): SyncSummary {
  const summary: SyncSummary = { total: 0, synced: 0, skipped: 0, failed: 0 };
  for (const { outcome } of outcomes) {
    summary.total++;
    summary[outcome.status]++;
  }
  return summary;
}

/**
 * Mirrors every listed repository into the GitLab group, one at a time.
 * Authentication, namespace and listing failures abort the run; anything that
 * goes wrong for a single repository is recorded as `failed` and the batch
 * moves on.
 */
export async function runSync(config: RunConfig, deps: SyncDependencies): Promise<SyncReport> {
  const log = deps.logger ?? defaultLogger;
  const sleep = deps.sleep ?? ((ms: number) => delay(ms));

  log.info("Checking GitHub authentication...");
  const githubLogin = await deps.source.checkAuth();
  log.info(`Checking GitLab authentication (${config.gitlabHost})...`);
  const gitlabUser = await deps.destination.checkAuth();
  log.success(`Authenticated as ${githubLogin} on GitHub and ${gitlabUser} on ${config.gitlabHost}`);

  await ensureNamespace(deps.destination, config.gitlabGroup, {
    dryRun: config.dryRun,
    logger: log,
  });

  const repos = await deps.source.listRepositories(config.githubUser);
  const outcomes: SyncReport["outcomes"] = [];

  for (const repo of repos) {
    const reason = skipReason(repo, config);
    if (reason) {
      log.warn(`Skipping ${reason}: ${repo.name}`);
      outcomes.push({ name: repo.name, outcome: { status: "skipped", reason } });
      continue;
    }

    log.plain("");
    log.info(
      `Processing: ${repo.name} (fork: ${repo.isFork}, archived: ${repo.isArchived}, private: ${repo.isPrivate})`
    );

    let outcome: SyncOutcome;
    try {
      outcome = await syncRepository(repo, config, deps, log, sleep);
    } catch (error) {
      outcome = { status: "failed", reason: redactUrl(errorMessage(error)) };
    }

    if (outcome.status === "failed") {
      log.error(`${repo.name}: ${outcome.reason}`);
    }
    outcomes.push({ name: repo.name, outcome });
  }

  return { summary: summarize(outcomes), outcomes };
}

async function syncRepository(
  repo: SourceRepository,
  config: RunConfig,
  deps: SyncDependencies,
  log: Logger,
  sleep: (ms: number) => Promise<void>
): Promise<SyncOutcome> {
  const namespace = config.gitlabGroup;

  if (await projectExists(deps.destination, namespace, repo.name)) {
    log.info(`GitLab repo already exists: ${namespace}/${repo.name}`);
  } else {
    const created = await createProject(
      deps.destination,
      {
        namespace,
        name: repo.name,
        description: repo.description,
        isPrivate: repo.isPrivate,
      },
      { dryRun: config.dryRun, logger: log }
    );
    if (!created.success) {
      return { status: "failed", reason: created.error.message };
    }
    // GitLab may not accept pushes to a project created a moment ago
    if (!config.dryRun && config.creationDelayMs > 0) {
      await sleep(config.creationDelayMs);
    }
  }

  const mirrored = await deps.mirror.mirror(
    repo.name,
    sourceFetchUrl(repo.cloneEndpoint, config, deps.credentials),
    destinationPushUrl(repo.name, config, deps.credentials)
  );

  return mirrored.success ? { status: "synced" } : { status: "failed", reason: mirrored.error.message };
}

export function printSummary(report: SyncReport, log: Logger = defaultLogger): void {
  const { summary } = report;

  log.plain("");
  log.plain("=========================================");
  log.info("Sync Summary:");
  log.plain(`  Total repositories: ${summary.total}`);
  log.plain(`  Successfully synced: ${summary.synced}`);
  log.plain(`  Skipped: ${summary.skipped}`);
  log.plain(`  Failed: ${summary.failed}`);

  const failures = report.outcomes.filter(({ outcome }) => outcome.status === "failed");
  if (failures.length > 0) {
    log.plain("");
    log.plain("  Failed repositories:");
    for (const { name, outcome } of failures) {
      if (outcome.status === "failed") {
        log.plain(`    - ${name}: ${outcome.reason}`);
      }
    }
  }
  log.plain("=========================================");
}
