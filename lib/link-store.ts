import type { PoolClient } from "pg";
import { query, withTransaction } from "@/lib/db";
import { METADATA_MAX_ATTEMPTS } from "@/lib/config";
import { ConflictError, NotFoundError, fromDatabaseError } from "@/lib/errors";
import type {
  Link,
  LinkMetadata,
  LinkPatch,
  MetadataState,
  PreparedDraft,
  Space,
  Tag,
} from "@/lib/links";

type LinkRow = {
  id: string;
  user_id: string;
  url: string;
  normalized_url: string;
  domain: string | null;
  title: string | null;
  description: string | null;
  thumbnail_url: string | null;
  note: string | null;
  space_id: string | null;
  tag_ids: string[] | null;
  created_at: Date;
  updated_at: Date;
  opened_at: Date | null;
  metadata_fetch_attempts: number;
  last_metadata_attempt_at: Date | null;
  metadata_complete: boolean;
};

type MetadataRow = Pick<
  LinkRow,
  "metadata_fetch_attempts" | "last_metadata_attempt_at" | "metadata_complete"
>;

const UUID_PATTERN = /^[0-9a-f]{8}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{4}-[0-9a-f]{12}$/i;

const LINK_SELECT = `
  SELECT l.id, l.user_id, l.url, l.normalized_url, l.domain, l.title, l.description,
         l.thumbnail_url, l.note, l.space_id, l.created_at, l.updated_at, l.opened_at,
         l.metadata_fetch_attempts, l.last_metadata_attempt_at, l.metadata_complete,
         COALESCE(
           array_agg(lt.tag_id::text ORDER BY lt.tag_id) FILTER (WHERE lt.tag_id IS NOT NULL),
           '{}'
         ) AS tag_ids
    FROM links l
    LEFT JOIN link_tags lt ON lt.link_id = l.id`;

const toState = (row: MetadataRow): MetadataState => ({
  attempts: row.metadata_fetch_attempts,
  lastAttemptAt: row.last_metadata_attempt_at?.toISOString() ?? null,
  complete: row.metadata_complete,
});

export const rowToLink = (row: LinkRow): Link => ({
  id: row.id,
  ownerId: row.user_id,
  url: row.url,
  normalizedUrl: row.normalized_url,
  domain: row.domain,
  title: row.title,
  description: row.description,
  thumbnailUrl: row.thumbnail_url,
  note: row.note,
  spaceId: row.space_id,
  tagIds: [...(row.tag_ids ?? [])].sort(),
  createdAt: row.created_at.toISOString(),
  updatedAt: row.updated_at.toISOString(),
  openedAt: row.opened_at?.toISOString() ?? null,
  metadataState: toState(row),
});

const assertLinkId = (linkId: string) => {
  if (!UUID_PATTERN.test(linkId)) {
    throw new NotFoundError();
  }
};

async function selectLink(client: PoolClient, ownerId: string, linkId: string) {
  const result = await client.query<LinkRow>(
    `${LINK_SELECT}
     WHERE l.user_id = $1 AND l.id = $2
     GROUP BY l.id`,
    [ownerId, linkId]
  );
  const row = result.rows[0];
  if (!row) {
    throw new NotFoundError();
  }
  return rowToLink(row);
}

async function assertOwnSpace(client: PoolClient, ownerId: string, spaceId: string | null) {
  if (spaceId === null) {
    return;
  }
  const result = await client.query("SELECT 1 FROM spaces WHERE user_id = $1 AND id = $2", [
    ownerId,
    spaceId,
  ]);
  if (!result.rowCount) {
    throw new ConflictError("The selected space no longer exists");
  }
}

/** Every requested tag must exist and belong to the owner, or nothing is written. */
async function replaceTags(client: PoolClient, ownerId: string, linkId: string, tagIds: string[]) {
  await client.query("DELETE FROM link_tags WHERE link_id = $1", [linkId]);
  if (!tagIds.length) {
    return;
  }
  const inserted = await client.query(
    `INSERT INTO link_tags (link_id, tag_id)
     SELECT $1, t.id FROM tags t
      WHERE t.user_id = $2 AND t.id = ANY($3::uuid[])`,
    [linkId, ownerId, tagIds]
  );
  if (inserted.rowCount !== new Set(tagIds).size) {
    throw new ConflictError("A selected tag no longer exists");
  }
}

export type ListLinksOptions = {
  pageIndex: number;
  pageSize: number;
  spaceId?: string | null;
};

/** Newest first; ties broken by id so offsets stay stable. */
export async function listLinks(ownerId: string, options: ListLinksOptions): Promise<Link[]> {
  const spaceId = options.spaceId ?? null;
  try {
    const result = await query<LinkRow>(
      `${LINK_SELECT}
       WHERE l.user_id = $1 AND ($2::uuid IS NULL OR l.space_id = $2::uuid)
       GROUP BY l.id
       ORDER BY l.created_at DESC, l.id DESC
       LIMIT $3 OFFSET $4`,
      [ownerId, spaceId, options.pageSize, options.pageIndex * options.pageSize]
    );
    return result.rows.map(rowToLink);
  } catch (error) {
    throw fromDatabaseError(error);
  }
}

export async function insertLink(ownerId: string, draft: PreparedDraft): Promise<Link> {
  try {
    return await withTransaction(async (client) => {
      await assertOwnSpace(client, ownerId, draft.spaceId);
      const inserted = await client.query<{ id: string }>(
        `INSERT INTO links (user_id, url, normalized_url, domain, title, note, space_id)
         VALUES ($1, $2, $3, $4, $4, $5, $6)
         RETURNING id`,
        [ownerId, draft.url, draft.normalizedUrl, draft.domain, draft.note, draft.spaceId]
      );
      const linkId = inserted.rows[0].id;
      await replaceTags(client, ownerId, linkId, draft.tagIds);
      return selectLink(client, ownerId, linkId);
    });
  } catch (error) {
    throw fromDatabaseError(error, draft.normalizedUrl);
  }
}

export async function updateLink(
  ownerId: string,
  linkId: string,
  patch: LinkPatch
): Promise<Link> {
  assertLinkId(linkId);
  const assignments: string[] = ["updated_at = now()"];
  const values: unknown[] = [ownerId, linkId];
  const assign = (column: string, value: unknown) => {
    values.push(value);
    assignments.push(`${column} = $${values.length}`);
  };
  if (patch.note !== undefined) {
    assign("note", patch.note);
  }
  if (patch.spaceId !== undefined) {
    assign("space_id", patch.spaceId);
  }
  if (patch.openedAt !== undefined) {
    assign("opened_at", patch.openedAt);
  }

  try {
    return await withTransaction(async (client) => {
      if (patch.spaceId !== undefined) {
        await assertOwnSpace(client, ownerId, patch.spaceId);
      }
      const updated = await client.query(
        `UPDATE links SET ${assignments.join(", ")}
          WHERE user_id = $1 AND id = $2`,
        values
      );
      if (!updated.rowCount) {
        throw new NotFoundError();
      }
      if (patch.tagIds !== undefined) {
        await replaceTags(client, ownerId, linkId, patch.tagIds);
      }
      return selectLink(client, ownerId, linkId);
    });
  } catch (error) {
    throw fromDatabaseError(error);
  }
}

export async function deleteLink(ownerId: string, linkId: string): Promise<void> {
  assertLinkId(linkId);
  let deleted: number | null;
  try {
    const result = await query("DELETE FROM links WHERE user_id = $1 AND id = $2", [
      ownerId,
      linkId,
    ]);
    deleted = result.rowCount;
  } catch (error) {
    throw fromDatabaseError(error);
  }
  if (!deleted) {
    throw new NotFoundError();
  }
}

/**
 * Spends one attempt of the metadata budget. The increment and the budget
 * check happen in one statement, so concurrent callers cannot overspend.
 * Returns null once the budget is gone.
 */
export async function recordMetadataAttempt(
  ownerId: string,
  linkId: string,
  at: Date,
  maxAttempts: number = METADATA_MAX_ATTEMPTS
): Promise<MetadataState | null> {
  assertLinkId(linkId);
  try {
    const result = await query<MetadataRow>(
      `UPDATE links
          SET metadata_fetch_attempts = metadata_fetch_attempts + 1,
              last_metadata_attempt_at = $3
        WHERE user_id = $1 AND id = $2 AND metadata_fetch_attempts < $4
        RETURNING metadata_fetch_attempts, last_metadata_attempt_at, metadata_complete`,
      [ownerId, linkId, at, maxAttempts]
    );
    if (result.rows[0]) {
      return toState(result.rows[0]);
    }
    const existing = await query<{ id: string }>(
      "SELECT id FROM links WHERE user_id = $1 AND id = $2",
      [ownerId, linkId]
    );
    if (!existing.rows[0]) {
      throw new NotFoundError();
    }
    return null;
  } catch (error) {
    throw fromDatabaseError(error);
  }
}

export async function completeMetadata(
  ownerId: string,
  linkId: string,
  metadata: LinkMetadata
): Promise<Link> {
  assertLinkId(linkId);
  try {
    return await withTransaction(async (client) => {
      const result = await client.query(
        `UPDATE links
            SET title = $3, description = $4, thumbnail_url = $5,
                domain = COALESCE($6, domain), metadata_complete = true, updated_at = now()
          WHERE user_id = $1 AND id = $2`,
        [
          ownerId,
          linkId,
          metadata.title,
          metadata.description,
          metadata.thumbnailUrl,
          metadata.domain || null,
        ]
      );
      if (!result.rowCount) {
        throw new NotFoundError();
      }
      return selectLink(client, ownerId, linkId);
    });
  } catch (error) {
    throw fromDatabaseError(error);
  }
}

/** Only reachable from an explicit user refresh. */
export async function resetMetadataAttempts(
  ownerId: string,
  linkId: string
): Promise<MetadataState> {
  assertLinkId(linkId);
  try {
    const result = await query<MetadataRow>(
      `UPDATE links
          SET metadata_fetch_attempts = 0, last_metadata_attempt_at = NULL,
              metadata_complete = false
        WHERE user_id = $1 AND id = $2
        RETURNING metadata_fetch_attempts, last_metadata_attempt_at, metadata_complete`,
      [ownerId, linkId]
    );
    if (!result.rows[0]) {
      throw new NotFoundError();
    }
    return toState(result.rows[0]);
  } catch (error) {
    throw fromDatabaseError(error);
  }
}

export async function listIncompleteMetadata(
  ownerId: string,
  limit: number,
  maxAttempts: number = METADATA_MAX_ATTEMPTS
): Promise<Link[]> {
  try {
    const result = await query<LinkRow>(
      `${LINK_SELECT}
       WHERE l.user_id = $1 AND l.metadata_complete = false
         AND l.metadata_fetch_attempts < $2
       GROUP BY l.id
       ORDER BY l.last_metadata_attempt_at ASC NULLS FIRST, l.created_at DESC
       LIMIT $3`,
      [ownerId, maxAttempts, limit]
    );
    return result.rows.map(rowToLink);
  } catch (error) {
    throw fromDatabaseError(error);
  }
}

export async function listTags(ownerId: string): Promise<Tag[]> {
  const result = await query<{ id: string; name: string; color: string; usage_count: number }>(
    `SELECT t.id, t.name, t.color, COUNT(lt.link_id)::int AS usage_count
       FROM tags t
       LEFT JOIN link_tags lt ON lt.tag_id = t.id
      WHERE t.user_id = $1
      GROUP BY t.id
      ORDER BY t.name ASC`,
    [ownerId]
  );
  return result.rows.map((row) => ({
    id: row.id,
    name: row.name,
    color: row.color,
    usageCount: row.usage_count,
  }));
}

export async function listSpaces(ownerId: string): Promise<Space[]> {
  const result = await query<{ id: string; name: string; color: string; link_count: number }>(
    `SELECT s.id, s.name, s.color, COUNT(l.id)::int AS link_count
       FROM spaces s
       LEFT JOIN links l ON l.space_id = s.id
      WHERE s.user_id = $1
      GROUP BY s.id
      ORDER BY s.name ASC`,
    [ownerId]
  );
  return result.rows.map((row) => ({
    id: row.id,
    name: row.name,
    color: row.color,
    linkCount: row.link_count,
  }));
}
