import type { SourceHost, SourceRepository } from "../../src/api/github-client.js";
import type { DestinationApi, ResourceResult } from "../../src/api/gitlab-client.js";
import type { RunConfig } from "../../src/config/run-config.js";
import { AuthenticationError, DestinationUnavailableError, MirrorError } from "../../src/errors.js";
import type { Logger } from "../../src/logger.js";
import type { Mirrorer, MirrorResult } from "../../src/migration/mirror.js";

export function sourceRepo(name: string, overrides: Partial<SourceRepository> = {}): SourceRepository {
  return {
    name,
    cloneEndpoint: `git@github.com:octo/${name}.git`,
    isFork: false,
    isArchived: false,
    isPrivate: false,
    description: "",
    ...overrides,
  };
}

export function runConfig(overrides: Partial<RunConfig> = {}): RunConfig {
  return {
    gitlabGroup: "github",
    gitlabHost: "gitlab.example.com",
    workDir: "/tmp/unused",
    includeForks: false,
    includeArchived: false,
    dryRun: false,
    protocol: "ssh",
    failOnError: false,
    creationDelayMs: 0,
    remoteName: "gitlab",
    repositoryLimit: 1000,
    ...overrides,
  };
}

export class FakeSource implements SourceHost {
  listCalls: Array<string | undefined> = [];

  constructor(
    private repos: SourceRepository[],
    private options: { authenticated?: boolean } = {}
  ) {}

  async checkAuth(): Promise<string> {
    if (this.options.authenticated === false) {
      throw new AuthenticationError("Not authenticated with GitHub");
    }
    return "octo";
  }

  async listRepositories(account?: string): Promise<SourceRepository[]> {
    this.listCalls.push(account);
    return [...this.repos];
  }
}

export interface RecordedPost {
  path: string;
  fields: Record<string, string>;
}

/**
 * In-memory GitLab: groups by full path, projects by `<group>/<path>`.
 * Paths listed in `failingGets` answer with a 500, `failingPosts` reject.
 */
export class FakeGitLab implements DestinationApi {
  readonly host = "gitlab.example.com";
  groups = new Map<string, number>();
  projects = new Set<string>();
  gets: string[] = [];
  posts: RecordedPost[] = [];
  failingGets = new Set<string>();
  failingPosts = new Set<string>();
  private nextId = 100;

  addGroup(fullPath: string): number {
    const id = this.nextId++;
    this.groups.set(fullPath, id);
    return id;
  }

  async checkAuth(): Promise<string> {
    return "mirror-bot";
  }

  async getResource(path: string): Promise<ResourceResult<unknown>> {
    this.gets.push(path);
    if (this.failingGets.has(path)) {
      return {
        status: "error",
        error: new DestinationUnavailableError("GitLab API error: 500 Internal Server Error", { status: 500 }),
      };
    }

    const [kind, encoded] = path.split("/");
    const id = decodeURIComponent(encoded ?? "");
    if (kind === "groups" && this.groups.has(id)) {
      return { status: "found", data: { id: this.groups.get(id), full_path: id } };
    }
    if (kind === "projects" && this.projects.has(id)) {
      return { status: "found", data: { id: 1, path_with_namespace: id } };
    }
    return { status: "not-found" };
  }

  async postResource(path: string, fields: Record<string, string>): Promise<unknown> {
    this.posts.push({ path, fields });
    if (this.failingPosts.has(path)) {
      throw new DestinationUnavailableError("GitLab API error: 403 Forbidden", { status: 403 });
    }

    if (path === "groups") {
      const parent = [...this.groups.entries()].find(([, id]) => String(id) === fields.parent_id);
      const fullPath = parent ? `${parent[0]}/${fields.path}` : fields.path;
      return { id: this.addGroup(fullPath), full_path: fullPath };
    }
    if (path === "projects") {
      const group = [...this.groups.entries()].find(([, id]) => String(id) === fields.namespace_id);
      this.projects.add(`${group?.[0]}/${fields.path}`);
      return { id: 1 };
    }
    throw new DestinationUnavailableError(`Unexpected POST ${path}`, { status: 404 });
  }
}

export class FakeMirror implements Mirrorer {
  calls: Array<{ name: string; source: string; destination: string }> = [];
  failing = new Set<string>();

  async mirror(name: string, source: string, destination: string): Promise<MirrorResult> {
    this.calls.push({ name, source, destination });
    if (this.failing.has(name)) {
      return { success: false, error: new MirrorError(`Failed to push ${name} to GitLab: connection reset`) };
    }
    return { success: true, action: "cloned" };
  }
}

export function recordingLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info: (message) => lines.push(`[INFO] ${message}`),
    success: (message) => lines.push(`[SUCCESS] ${message}`),
    warn: (message) => lines.push(`[WARN] ${message}`),
    error: (message) => lines.push(`[ERROR] ${message}`),
    plain: (message) => lines.push(message),
  };
}
