import type { DestinationApi } from "../api/gitlab-client.js";
import { CreationError, DestinationUnavailableError, errorMessage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";
import { GroupSchema, groupPath } from "./namespace.js";

export type Visibility = "private" | "public";

export interface CreateProjectRequest {
  namespace: string;
  name: string;
  description: string;
  isPrivate: boolean;
}

export type CreateProjectResult = { success: true } | { success: false; error: CreationError };

export interface CreateProjectOptions {
  dryRun: boolean;
  logger?: Logger;
}

export function toVisibility(isPrivate: boolean): Visibility {
  return isPrivate ? "private" : "public";
}

/** URL-safe project path derived from a repository name. */
export function projectPath(name: string): string {
  return name.replace(/[^A-Za-z0-9_.-]/g, "-");
}

/**
 * `<namespace>/<path>` with every separator percent-encoded, so GitLab reads
 * it as one project id rather than nested route segments.
 */
export function encodedProjectId(namespace: string, name: string): string {
  return encodeURIComponent(`${namespace}/${projectPath(name)}`);
}

export async function projectExists(
  api: DestinationApi,
  namespace: string,
  name: string
): Promise<boolean> {
  const result = await api.getResource(`projects/${encodedProjectId(namespace, name)}`);

  switch (result.status) {
    case "found":
      return true;
    case "not-found":
      return false;
    case "error":
      throw new DestinationUnavailableError(
        `Could not check GitLab repository ${namespace}/${name}: ${result.error.message}`,
        { status: result.error.status, cause: result.error }
      );
  }
}

export async function createProject(
  api: DestinationApi,
  request: CreateProjectRequest,
  options: CreateProjectOptions
): Promise<CreateProjectResult> {
  const log = options.logger ?? defaultLogger;
  const { namespace, name, description, isPrivate } = request;

  log.info(`Creating GitLab repository: ${namespace}/${name}`);

  if (options.dryRun) {
    log.info(`[DRY RUN] Would create GitLab repo '${namespace}/${name}'`);
    return { success: true };
  }

  // Project creation takes the numeric namespace id, not its path
  const group = await api.getResource(groupPath(namespace));
  if (group.status !== "found") {
    const reason = group.status === "error" ? group.error.message : "group not found";
    return {
      success: false,
      error: new CreationError(`Could not resolve GitLab group '${namespace}': ${reason}`),
    };
  }
  const parsedGroup = GroupSchema.safeParse(group.data);
  if (!parsedGroup.success) {
    return {
      success: false,
      error: new CreationError(`GitLab group '${namespace}' has no numeric id`),
    };
  }

  try {
    await api.postResource("projects", {
      name,
      path: projectPath(name),
      namespace_id: String(parsedGroup.data.id),
      visibility: toVisibility(isPrivate),
      description,
      // A mirror push needs an empty repository
      initialize_with_readme: "false",
    });
  } catch (error) {
    return {
      success: false,
      error: new CreationError(
        `Failed to create GitLab repository ${namespace}/${name}: ${errorMessage(error)}`,
        { cause: error }
      ),
    };
  }

  log.success(`Created GitLab repository ${namespace}/${name}`);
  return { success: true };
}
