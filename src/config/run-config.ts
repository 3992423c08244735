import { z } from "zod";
import { AuthenticationError, ConfigError } from "../errors.js";

export const DEFAULT_WORK_DIR = "/tmp/github-mirror";
export const DEFAULT_REMOTE_NAME = "gitlab";
export const DEFAULT_REPOSITORY_LIMIT = 1000;

export const ProtocolSchema = z.enum(["ssh", "https"]);

export const RunConfigSchema = z.object({
  gitlabGroup: z.string().trim().min(1, "GitLab group must not be empty"),
  gitlabHost: z
    .string()
    .trim()
    .min(1, "GitLab host must not be empty")
    .regex(
      /^[^\s/:]+(?::\d{1,5})?$/,
      "GitLab host must be a bare host name with an optional port, without scheme or path"
    ),
  githubUser: z.string().trim().min(1).optional(),
  workDir: z.string().min(1, "Work directory must not be empty"),
  includeForks: z.boolean(),
  includeArchived: z.boolean(),
  dryRun: z.boolean(),
  protocol: ProtocolSchema,
  failOnError: z.boolean(),
  creationDelayMs: z.number().int().nonnegative(),
  remoteName: z.string().min(1),
  repositoryLimit: z.number().int().positive(),
});

export type GitProtocol = z.infer<typeof ProtocolSchema>;
export type RunConfig = Readonly<z.infer<typeof RunConfigSchema>>;

/** Values given on the command line; they win over the environment. */
export interface CliFlags {
  gitlabGroup?: string;
  gitlabHost?: string;
  githubUser?: string;
  workDir?: string;
  includeForks?: boolean;
  includeArchived?: boolean;
  dryRun?: boolean;
  protocol?: string;
  failOnError?: boolean;
}

export interface Credentials {
  githubToken: string;
  gitlabToken: string;
}

type Env = Record<string, string | undefined>;

export function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  return ["true", "1", "yes"].includes(value.trim().toLowerCase());
}

function parseInteger(name: string, value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new ConfigError(`${name} must be an integer, got '${value}'`);
  }
  return parsed;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

export function loadRunConfig(flags: CliFlags, env: Env = process.env): RunConfig {
  const candidate = {
    gitlabGroup: flags.gitlabGroup ?? nonEmpty(env.GITLAB_GROUP) ?? "github",
    gitlabHost: flags.gitlabHost ?? nonEmpty(env.GITLAB_HOST) ?? "gitlab.com",
    githubUser: flags.githubUser ?? nonEmpty(env.GITHUB_USER),
    workDir: flags.workDir ?? nonEmpty(env.WORK_DIR) ?? DEFAULT_WORK_DIR,
    includeForks: flags.includeForks || parseBoolean(env.INCLUDE_FORKS) || false,
    includeArchived: flags.includeArchived || parseBoolean(env.INCLUDE_ARCHIVED) || false,
    dryRun: flags.dryRun || parseBoolean(env.DRY_RUN) || false,
    protocol: flags.protocol ?? nonEmpty(env.GIT_PROTOCOL) ?? "ssh",
    failOnError: flags.failOnError || parseBoolean(env.FAIL_ON_ERROR) || false,
    creationDelayMs: parseInteger("CREATION_DELAY_MS", env.CREATION_DELAY_MS) ?? 1000,
    remoteName: DEFAULT_REMOTE_NAME,
    repositoryLimit: DEFAULT_REPOSITORY_LIMIT,
  };

  const result = RunConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`, {
      hint: "Run with --help to see the accepted options.",
    });
  }

  return Object.freeze(result.data);
}

export function loadCredentials(config: RunConfig, env: Env = process.env): Credentials {
  const githubToken = nonEmpty(env.GITHUB_TOKEN) ?? nonEmpty(env.GH_TOKEN);
  if (!githubToken) {
    throw new AuthenticationError("Not authenticated with GitHub: GITHUB_TOKEN is not set.", {
      hint: "Export GITHUB_TOKEN with a personal access token that has the 'repo' scope.",
    });
  }

  const gitlabToken = nonEmpty(env.GITLAB_TOKEN);
  if (!gitlabToken) {
    throw new AuthenticationError(
      `Not authenticated with GitLab (${config.gitlabHost}): GITLAB_TOKEN is not set.`,
      {
        hint: `Export GITLAB_TOKEN with a personal access token for ${config.gitlabHost} that has the 'api' scope.`,
      }
    );
  }

  return { githubToken, gitlabToken };
}
