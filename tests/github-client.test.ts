import { describe, test, expect, vi } from "vitest";
import { GitHubClient } from "../src/api/github-client.js";
import { AuthenticationError, SourceUnavailableError } from "../src/errors.js";
import { silentLogger } from "../src/logger.js";

function jsonResponse(status: number, body: unknown, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8", ...headers },
  });
}

function apiRepo(name: string, overrides: Record<string, unknown> = {}) {
  return {
    name,
    full_name: `octo/${name}`,
    ssh_url: `git@github.com:octo/${name}.git`,
    clone_url: `https://github.com/octo/${name}.git`,
    fork: false,
    archived: false,
    private: false,
    description: null,
    ...overrides,
  };
}

function clientWith(
  routes: (url: URL) => Response,
  options: { protocol?: "ssh" | "https"; limit?: number } = {}
) {
  const requests: URL[] = [];
  const fetchMock = vi.fn(async (input: string | URL | Request) => {
    const url = new URL(input instanceof Request ? input.url : String(input));
    requests.push(url);
    return routes(url);
  });
  const client = new GitHubClient({
    token: "test-github-token",
    logger: silentLogger,
    fetch: fetchMock,
    ...options,
  });
  return { client, requests };
}

describe("GitHubClient", () => {
  test("checkAuth returns the authenticated login", async () => {
    const { client } = clientWith(() => jsonResponse(200, { login: "octo" }));

    await expect(client.checkAuth()).resolves.toBe("octo");
  });

  test("checkAuth maps bad credentials to an authentication error", async () => {
    const { client } = clientWith(() => jsonResponse(401, { message: "Bad credentials" }));

    await expect(client.checkAuth()).rejects.toBeInstanceOf(AuthenticationError);
  });

  test("checkAuth maps a forbidden token to an authentication error with a hint", async () => {
    const { client } = clientWith(() => jsonResponse(403, { message: "Forbidden" }));

    const error = await client.checkAuth().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(AuthenticationError);
    expect(error).toMatchObject({
      message: "Not authenticated with GitHub: Forbidden",
      hint: "Export GITHUB_TOKEN with a personal access token that has the 'repo' scope.",
    });
  });

  test("checkAuth keeps a rate-limit 403 apart from bad credentials", async () => {
    const { client } = clientWith(() => jsonResponse(403, { message: "API rate limit exceeded for user." }));

    await expect(client.checkAuth()).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  test("lists the authenticated user's own repositories, private ones included", async () => {
    const { client, requests } = clientWith((url) => {
      if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
      return jsonResponse(200, [
        apiRepo("tools", { private: true, description: "Internal tools" }),
        apiRepo("fork-of-lib", { fork: true }),
        apiRepo("legacy", { archived: true }),
      ]);
    });

    const repos = await client.listRepositories();

    expect(repos).toEqual([
      {
        name: "tools",
        cloneEndpoint: "git@github.com:octo/tools.git",
        isFork: false,
        isArchived: false,
        isPrivate: true,
        description: "Internal tools",
      },
      {
        name: "fork-of-lib",
        cloneEndpoint: "git@github.com:octo/fork-of-lib.git",
        isFork: true,
        isArchived: false,
        isPrivate: false,
        description: "",
      },
      {
        name: "legacy",
        cloneEndpoint: "git@github.com:octo/legacy.git",
        isFork: false,
        isArchived: true,
        isPrivate: false,
        description: "",
      },
    ]);
    const listing = requests[requests.length - 1];
    expect(listing.pathname).toBe("/user/repos");
    expect(listing.searchParams.get("affiliation")).toBe("owner");
    expect(listing.searchParams.get("per_page")).toBe("100");
  });

  test("lists an organisation's private repositories through the org listing", async () => {
    const { client, requests } = clientWith((url) => {
      if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
      if (url.pathname === "/users/acme") return jsonResponse(200, { login: "acme", type: "Organization" });
      if (url.pathname === "/orgs/acme/repos") {
        return jsonResponse(200, [apiRepo("public-site"), apiRepo("internal-api", { private: true })]);
      }
      return jsonResponse(200, [apiRepo("public-site")]);
    });

    const repos = await client.listRepositories("acme");

    expect(repos.map((repo) => [repo.name, repo.isPrivate])).toEqual([
      ["public-site", false],
      ["internal-api", true],
    ]);
    const listing = requests[requests.length - 1];
    expect(listing.pathname).toBe("/orgs/acme/repos");
    expect(listing.searchParams.get("type")).toBe("all");
  });

  test("lists another user through the user listing", async () => {
    const { client, requests } = clientWith((url) => {
      if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
      if (url.pathname === "/users/hubber") return jsonResponse(200, { login: "hubber", type: "User" });
      return jsonResponse(200, [apiRepo("site")]);
    });

    const repos = await client.listRepositories("hubber");

    expect(repos.map((repo) => repo.name)).toEqual(["site"]);
    expect(requests[requests.length - 1].pathname).toBe("/users/hubber/repos");
  });

  test("reports an unknown account as the source being unavailable", async () => {
    const { client } = clientWith((url) => {
      if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
      return jsonResponse(404, { message: "Not Found" });
    });

    await expect(client.listRepositories("nobody")).rejects.toBeInstanceOf(SourceUnavailableError);
  });

  test("treats the own login in any case as the authenticated listing", async () => {
    const { client, requests } = clientWith((url) => {
      if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
      return jsonResponse(200, []);
    });

    await client.listRepositories("OCTO");

    expect(requests[requests.length - 1].pathname).toBe("/user/repos");
  });

  test("uses HTTPS clone URLs when configured", async () => {
    const { client } = clientWith(
      (url) => {
        if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
        return jsonResponse(200, [apiRepo("tools")]);
      },
      { protocol: "https" }
    );

    const [repo] = await client.listRepositories();

    expect(repo.cloneEndpoint).toBe("https://github.com/octo/tools.git");
  });

  test("follows pagination and stops at the limit", async () => {
    const { client, requests } = clientWith(
      (url) => {
        if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
        const page = url.searchParams.get("page") ?? "1";
        const next = `https://api.github.com/user/repos?affiliation=owner&per_page=100&page=${Number(page) + 1}`;
        return jsonResponse(200, [apiRepo(`repo-${page}-a`), apiRepo(`repo-${page}-b`)], {
          link: `<${next}>; rel="next"`,
        });
      },
      { limit: 3 }
    );

    const repos = await client.listRepositories();

    expect(repos.map((repo) => repo.name)).toEqual(["repo-1-a", "repo-1-b", "repo-2-a"]);
    expect(requests.filter((url) => url.pathname === "/user/repos")).toHaveLength(2);
  });

  test("reports listing failures as the source being unavailable", async () => {
    const { client } = clientWith((url) => {
      if (url.pathname === "/user") return jsonResponse(200, { login: "octo" });
      return jsonResponse(422, { message: "Validation Failed" });
    });

    await expect(client.listRepositories()).rejects.toBeInstanceOf(SourceUnavailableError);
  });
});
