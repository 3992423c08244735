import { cac } from "cac";
import { z } from "zod";
import type { CliFlags } from "./config/run-config.js";
import { ConfigError } from "./errors.js";

export const USAGE = `Usage: github-gitlab-mirror [OPTIONS]

Sync all GitHub repositories to a GitLab instance.

Options:
    -g, --gitlab-group      GitLab group/namespace to sync to (default: github)
    -h, --gitlab-host       GitLab host (default: gitlab.com)
    -u, --github-user       GitHub username (default: authenticated user)
    -w, --work-dir          Working directory for cloning (default: /tmp/github-mirror)
    -f, --include-forks     Include forked repositories (default: false)
    -a, --include-archived  Include archived repositories (default: false)
    -d, --dry-run           Show what would be done without doing it
    -p, --protocol          Git transport, ssh or https (default: ssh)
    --fail-on-error         Exit with status 1 when any repository failed
    --help                  Show this help message

Environment variables:
    GITHUB_TOKEN            GitHub personal access token (required)
    GITLAB_TOKEN            GitLab personal access token (required)
    GITLAB_GROUP, GITLAB_HOST, GITHUB_USER, WORK_DIR, INCLUDE_FORKS,
    INCLUDE_ARCHIVED, DRY_RUN, GIT_PROTOCOL, FAIL_ON_ERROR, CREATION_DELAY_MS

Examples:
    github-gitlab-mirror -g github -h gitlab.example.com
    github-gitlab-mirror --include-forks --include-archived
    DRY_RUN=true github-gitlab-mirror
`;

export type ParsedCli = { help: true } | { help: false; flags: CliFlags };

const optionValue = z.union([z.string(), z.number()]).transform(String).optional();

const CliOptionsSchema = z.object({
  gitlabGroup: optionValue,
  gitlabHost: optionValue,
  githubUser: optionValue,
  workDir: optionValue,
  protocol: optionValue,
  includeForks: z.boolean().optional(),
  includeArchived: z.boolean().optional(),
  dryRun: z.boolean().optional(),
  failOnError: z.boolean().optional(),
  help: z.boolean().optional(),
});

const KNOWN_OPTIONS = new Set([
  ...Object.keys(CliOptionsSchema.shape),
  "g",
  "h",
  "u",
  "w",
  "p",
  "f",
  "a",
  "d",
  "--",
]);

function camelCase(name: string): string {
  return name.replace(/-([a-z])/g, (_match, letter: string) => letter.toUpperCase());
}

function flagName(key: string): string {
  return key.length === 1 ? `-${key}` : `--${key.replace(/[A-Z]/g, (c) => `-${c.toLowerCase()}`)}`;
}

/**
 * Parses command-line arguments (without the node binary and script path).
 * `-h` selects the GitLab host, so help is only reachable as `--help`.
 */
export function parseCliArgs(args: string[]): ParsedCli {
  const cli = cac("github-gitlab-mirror");

  cli.option("-g, --gitlab-group <group>", "GitLab group/namespace to sync to");
  cli.option("-h, --gitlab-host <host>", "GitLab host");
  cli.option("-u, --github-user <user>", "GitHub username");
  cli.option("-w, --work-dir <dir>", "Working directory for cloning");
  cli.option("-f, --include-forks", "Include forked repositories");
  cli.option("-a, --include-archived", "Include archived repositories");
  cli.option("-d, --dry-run", "Show what would be done without doing it");
  cli.option("-p, --protocol <protocol>", "Git transport, ssh or https");
  cli.option("--fail-on-error", "Exit with status 1 when any repository failed");
  cli.option("--help", "Show this help message");

  const parsed = cli.parse(["node", "github-gitlab-mirror", ...args], { run: false });

  const unknown = Object.keys(parsed.options).filter(
    (key) => !KNOWN_OPTIONS.has(key) && !KNOWN_OPTIONS.has(camelCase(key))
  );
  if (unknown.length > 0) {
    throw new ConfigError(`Unknown option: ${unknown.map(flagName).join(", ")}`);
  }
  if (parsed.args.length > 0) {
    throw new ConfigError(`Unexpected argument: ${parsed.args.join(" ")}`);
  }

  const options = CliOptionsSchema.safeParse(parsed.options);
  if (!options.success) {
    const names = options.error.issues.map((issue) => flagName(String(issue.path[0])));
    throw new ConfigError(`Invalid value for ${[...new Set(names)].join(", ")}`);
  }

  const { help, ...flags } = options.data;
  if (help) {
    return { help: true };
  }
  return { help: false, flags };
}
