import { z } from "zod";
import { AuthenticationError, DestinationUnavailableError } from "../errors.js";

/**
 * Outcome of a GET against the destination. A missing resource is kept apart
 * from every other failure so callers cannot mistake an outage for absence.
 */
export type ResourceResult<T> =
  | { status: "found"; data: T }
  | { status: "not-found" }
  | { status: "error"; error: DestinationUnavailableError };

/** What the destination modules need from the destination hosting service. */
export interface DestinationApi {
  readonly host: string;
  /** Returns the authenticated username. */
  checkAuth(): Promise<string>;
  getResource(path: string): Promise<ResourceResult<unknown>>;
  /** POSTs form fields; throws `DestinationUnavailableError` on any failure. */
  postResource(path: string, fields: Record<string, string>): Promise<unknown>;
}

export interface GitLabClientOptions {
  token: string;
  host: string;
  fetch?: typeof fetch;
}

const UserSchema = z.object({ username: z.string() });

export class GitLabClient implements DestinationApi {
  readonly host: string;
  private token: string;
  private baseUrl: string;
  private fetchImpl: typeof fetch;

  constructor(options: GitLabClientOptions) {
    this.token = options.token;
    this.host = options.host;
    this.baseUrl = `https://${options.host}/api/v4`;
    this.fetchImpl = options.fetch ?? fetch;
  }

  private async request(method: string, path: string, body?: URLSearchParams): Promise<unknown> {
    const url = `${this.baseUrl}/${path}`;

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers: {
          "PRIVATE-TOKEN": this.token,
          Accept: "application/json",
          ...(body && { "Content-Type": "application/x-www-form-urlencoded" }),
        },
        body,
      });
    } catch (error) {
      throw new DestinationUnavailableError(
        `GitLab request ${method} ${path} failed: ${error instanceof Error ? error.message : String(error)}`,
        { cause: error }
      );
    }

    const text = await response.text();
    if (!response.ok) {
      throw new DestinationUnavailableError(
        `GitLab API error: ${response.status} ${response.statusText} - ${describeBody(text)}`,
        { status: response.status }
      );
    }

    return text ? parseJson(text) : {};
  }

  async checkAuth(): Promise<string> {
    try {
      const user = UserSchema.safeParse(await this.request("GET", "user"));
      if (!user.success) {
        throw new DestinationUnavailableError(`Unexpected response from ${this.host} for the current user`);
      }
      return user.data.username;
    } catch (error) {
      if (error instanceof DestinationUnavailableError && error.status === 401) {
        throw new AuthenticationError(`Not authenticated with GitLab (${this.host}).`, {
          hint: `Export GITLAB_TOKEN with a personal access token for ${this.host} that has the 'api' scope.`,
          cause: error,
        });
      }
      throw error;
    }
  }

  async getResource(path: string): Promise<ResourceResult<unknown>> {
    try {
      return { status: "found", data: await this.request("GET", path) };
    } catch (error) {
      if (error instanceof DestinationUnavailableError) {
        return error.status === 404 ? { status: "not-found" } : { status: "error", error };
      }
      throw error;
    }
  }

  async postResource(path: string, fields: Record<string, string>): Promise<unknown> {
    return this.request("POST", path, new URLSearchParams(fields));
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** GitLab errors come back as `{"message": ...}` or `{"error": ...}`. */
function describeBody(text: string): string {
  const body = parseJson(text);
  if (body && typeof body === "object") {
    if ("message" in body) return JSON.stringify(body.message);
    if ("error" in body) return JSON.stringify(body.error);
  }
  return text;
}
