// ---------------------------------------------------------------------------
// User search – GET /users?q=..., read page by page into User handles.
// ---------------------------------------------------------------------------

import type { Environment } from "../../core/types.js";
import type { ResourceContext } from "../base/resource-handle.js";
import { User } from "./user.js";
import { getIn, isRecord, jsonCodec, readText, toArray } from "../../utils/documents.js";

export const USER_PAGE_LIMIT = 100;

export interface UserSearchScope {
  zone: string;
  environment?: Environment;
}

/**
 * Find users matching an Alma search query such as `"last_name~Example"`.
 * The returned handles carry only the primary ID; call `load()` for details.
 * Errors propagate like any read.
 */
export async function searchUsers(
  ctx: ResourceContext,
  query: string,
  scope: UserSearchScope,
): Promise<User[]> {
  const environment = scope.environment ?? "production";
  const credential = ctx.registry.resolve(scope.zone, environment, "Users", "read");
  const log = ctx.logger.child({ component: "UserSearch", zone: credential.zone, environment });

  const users: User[] = [];
  let offset = 0;
  let total = Number.POSITIVE_INFINITY;

  while (offset < total) {
    const response = await ctx.executor.execute({
      method: "GET",
      path: "/users",
      credential,
      format: "json",
      query: { q: query, limit: String(USER_PAGE_LIMIT), offset: String(offset) },
    });
    const page = jsonCodec.parse(response.payload);
    total = Number(getIn(page, ["total_record_count"]) ?? 0);

    const batch = toArray(page["user"]).filter(isRecord);
    if (batch.length === 0) break;
    offset += batch.length;
    for (const entry of batch) {
      const primaryId = readText(entry, ["primary_id"]);
      if (primaryId !== null) {
        users.push(new User(ctx, { zone: scope.zone, environment, primaryId }));
      }
    }
  }

  log.info({ query, count: users.length }, "Users found");
  return users;
}
