import { z } from "zod";
import type { DestinationApi } from "../api/gitlab-client.js";
import { NamespaceError, errorMessage } from "../errors.js";
import { logger as defaultLogger, type Logger } from "../logger.js";

export const GroupSchema = z.object({
  id: z.number(),
  full_path: z.string().optional(),
});

export interface NamespaceOptions {
  dryRun: boolean;
  logger?: Logger;
}

export function groupPath(name: string): string {
  return `groups/${encodeURIComponent(name)}`;
}

const CREATE_HINT =
  "Create the group manually on GitLab, or use a token whose user may create groups there.";

/**
 * Makes sure the GitLab group exists, creating it as a private group when
 * missing. Returns the group id, or `undefined` when a dry run skipped the
 * creation. Every failure is fatal for the run.
 */
export async function ensureNamespace(
  api: DestinationApi,
  name: string,
  options: NamespaceOptions
): Promise<number | undefined> {
  const log = options.logger ?? defaultLogger;

  log.info(`Checking if GitLab group '${name}' exists...`);
  const existing = await findGroupId(api, name);
  if (existing !== undefined) {
    log.success(`GitLab group '${name}' exists`);
    return existing;
  }

  log.warn(`GitLab group '${name}' not found`);

  if (options.dryRun) {
    log.info(`[DRY RUN] Would create GitLab group '${name}'`);
    return undefined;
  }

  const segments = name.split("/");
  const path = segments[segments.length - 1];
  const fields: Record<string, string> = { name: path, path, visibility: "private" };

  if (segments.length > 1) {
    const parentName = segments.slice(0, -1).join("/");
    const parentId = await findGroupId(api, parentName);
    if (parentId === undefined) {
      throw new NamespaceError(`Parent group '${parentName}' of '${name}' does not exist`, {
        hint: CREATE_HINT,
      });
    }
    fields.parent_id = String(parentId);
  }

  log.info(`Creating GitLab group '${name}'...`);
  let created: unknown;
  try {
    created = await api.postResource("groups", fields);
  } catch (error) {
    throw new NamespaceError(`Failed to create GitLab group '${name}': ${errorMessage(error)}`, {
      hint: CREATE_HINT,
      cause: error,
    });
  }

  const group = GroupSchema.safeParse(created);
  if (!group.success) {
    throw new NamespaceError(`GitLab did not return an id for the new group '${name}'`, {
      hint: CREATE_HINT,
    });
  }

  log.success(`Created GitLab group '${name}'`);
  return group.data.id;
}

async function findGroupId(api: DestinationApi, name: string): Promise<number | undefined> {
  const result = await api.getResource(groupPath(name));

  switch (result.status) {
    case "not-found":
      return undefined;
    case "error":
      throw new NamespaceError(`Could not look up GitLab group '${name}': ${result.error.message}`, {
        hint: `Check that ${api.host} is reachable and GITLAB_TOKEN is valid.`,
        cause: result.error,
      });
    case "found": {
      const group = GroupSchema.safeParse(result.data);
      if (!group.success) {
        throw new NamespaceError(`Unexpected response for GitLab group '${name}'`);
      }
      return group.data.id;
    }
  }
}
