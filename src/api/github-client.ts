import { Octokit } from "@octokit/rest";
import { throttling } from "@octokit/plugin-throttling";
import type { GitProtocol } from "../config/run-config.js";
import {
  AuthenticationError,
  SourceUnavailableError,
  errorMessage,
  statusOf,
} from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

export interface SourceRepository {
  name: string;
  cloneEndpoint: string;
  isFork: boolean;
  isArchived: boolean;
  isPrivate: boolean;
  description: string;
}

/** What the orchestrator needs from the source hosting service. */
export interface SourceHost {
  /** Returns the authenticated login. */
  checkAuth(): Promise<string>;
  listRepositories(account?: string): Promise<SourceRepository[]>;
}

export interface GitHubClientOptions {
  token: string;
  protocol?: GitProtocol;
  limit?: number;
  logger?: Logger;
  fetch?: typeof fetch;
}

/** Fields shared by the full and minimal repository payloads. */
interface ListedRepo {
  name: string;
  full_name: string;
  ssh_url?: string;
  clone_url?: string;
  fork: boolean;
  archived?: boolean;
  private: boolean;
  description: string | null;
}

const ThrottledOctokit = Octokit.plugin(throttling);

const AUTH_HINT = "Export GITHUB_TOKEN with a personal access token that has the 'repo' scope.";

export class GitHubClient implements SourceHost {
  private octokit: InstanceType<typeof ThrottledOctokit>;
  private protocol: GitProtocol;
  private limit: number;
  private logger: Logger;
  private login?: string;

  constructor(options: GitHubClientOptions) {
    this.protocol = options.protocol ?? "ssh";
    this.limit = options.limit ?? 1000;
    this.logger = options.logger ?? defaultLogger;

    const log = this.logger;
    this.octokit = new ThrottledOctokit({
      auth: options.token,
      request: options.fetch ? { fetch: options.fetch } : undefined,
      throttle: {
        onRateLimit: (retryAfter, requestOptions, _octokit, retryCount) => {
          log.warn(`Rate limit hit for ${requestOptions.method} ${requestOptions.url}`);
          if (retryCount < 3) {
            log.info(`Retrying after ${retryAfter} seconds`);
            return true;
          }
          return false;
        },
        onSecondaryRateLimit: (_retryAfter, requestOptions) => {
          log.warn(`Secondary rate limit hit for ${requestOptions.method} ${requestOptions.url}`);
          return true;
        },
      },
    });
  }

  async checkAuth(): Promise<string> {
    if (this.login) return this.login;

    try {
      const { data } = await this.octokit.users.getAuthenticated();
      this.login = data.login;
      return data.login;
    } catch (error) {
      throw this.toSourceError("Failed to verify GitHub authentication", error);
    }
  }

  async listRepositories(account?: string): Promise<SourceRepository[]> {
    const login = await this.checkAuth();
    const ownRepos = !account || account.toLowerCase() === login.toLowerCase();
    const repos: SourceRepository[] = [];

    this.logger.info(`Fetching GitHub repositories for ${ownRepos ? login : account}...`);

    try {
      // The authenticated listing is the only one that returns the user's private repositories
      const pages: AsyncIterable<{ data: ListedRepo[] }> =
        ownRepos || !account
          ? this.octokit.paginate.iterator(this.octokit.repos.listForAuthenticatedUser, {
              affiliation: "owner",
              per_page: 100,
            })
          : await this.accountListing(account);

      for await (const response of pages) {
        for (const repo of response.data) {
          repos.push(this.toSourceRepository(repo));
        }
        if (repos.length >= this.limit) break;
      }
    } catch (error) {
      throw this.toSourceError("Failed to list GitHub repositories", error);
    }

    const listed = repos.slice(0, this.limit);
    this.logger.info(`Found ${listed.length} GitHub repositories`);
    return listed;
  }

  /**
   * Organisations are listed through the org endpoint, which includes the
   * private repositories the token can read; `/users/{name}/repos` never does.
   */
  private async accountListing(account: string): Promise<AsyncIterable<{ data: ListedRepo[] }>> {
    const { data: owner } = await this.octokit.users.getByUsername({ username: account });

    if (owner.type === "Organization") {
      return this.octokit.paginate.iterator(this.octokit.repos.listForOrg, {
        org: account,
        type: "all",
        per_page: 100,
      });
    }
    return this.octokit.paginate.iterator(this.octokit.repos.listForUser, {
      username: account,
      per_page: 100,
    });
  }

  private toSourceRepository(repo: ListedRepo): SourceRepository {
    const httpsUrl = repo.clone_url ?? `https://github.com/${repo.full_name}.git`;
    const sshUrl = repo.ssh_url ?? `git@github.com:${repo.full_name}.git`;

    return {
      name: repo.name,
      cloneEndpoint: this.protocol === "https" ? httpsUrl : sshUrl,
      isFork: repo.fork,
      isArchived: repo.archived ?? false,
      isPrivate: repo.private,
      description: repo.description ?? "",
    };
  }

  private toSourceError(context: string, error: unknown): Error {
    const status = statusOf(error);
    // Rate-limit 403s that outlast the throttling retries are not credential problems
    if (status === 401 || (status === 403 && !/rate limit/i.test(errorMessage(error)))) {
      return new AuthenticationError(`Not authenticated with GitHub: ${errorMessage(error)}`, {
        hint: AUTH_HINT,
        cause: error,
      });
    }
    return new SourceUnavailableError(`${context}: ${errorMessage(error)}`, { cause: error });
  }
}
