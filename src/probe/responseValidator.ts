const SUCCESS_CODES: ReadonlySet<unknown> = new Set([1, 200]);

// Canonical field -> field names accepted in its place.
const ITEM_FIELD_ALIASES: Record<string, readonly string[]> = {
  vod_id: ["id", "video_id"],
  vod_name: ["name", "title"]
};

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasField(item: Record<string, unknown>, canonical: string): boolean {
  if (canonical in item) return true;
  const aliases = ITEM_FIELD_ALIASES[canonical] ?? [];
  return aliases.some((alias) => alias in item);
}

function isCatalogItem(item: unknown): boolean {
  if (!isPlainObject(item)) return false;
  return Object.keys(ITEM_FIELD_ALIASES).every((canonical) => hasField(item, canonical));
}

/**
 * Heuristic check that a decoded JSON body looks like catalog/listing data.
 * Over-accepts: any non-empty object without `code`, `list` or `data` passes.
 */
export function isValidCatalogResponse(payload: unknown): boolean {
  if (!isPlainObject(payload)) return false;

  if ("code" in payload && !SUCCESS_CODES.has(payload.code)) {
    return false;
  }

  if ("list" in payload) {
    const list = payload.list;
    if (!Array.isArray(list)) return false;
    return list.length === 0 || isCatalogItem(list[0]);
  }

  if ("data" in payload) {
    return Array.isArray(payload.data) || isPlainObject(payload.data);
  }

  return Object.keys(payload).length > 0;
}
