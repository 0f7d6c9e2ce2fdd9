import { ENSEMBLE_MODEL, PERSPECTIVES, type Perspective, type PerspectiveEntry } from "../types.js";

/** Lower-case, trim, and drop any `:version` suffix. */
export function normalizeModelName(name: string): string {
  const normalized = name.trim().toLowerCase();
  const colon = normalized.indexOf(":");
  return colon === -1 ? normalized : normalized.slice(0, colon);
}

export function isPerspective(value: string): value is Perspective {
  return (PERSPECTIVES as readonly string[]).includes(value);
}

/**
 * Resolve the perspective a model's score counts towards.
 *
 * Matching order, first hit wins:
 *  1. empty name → the first table entry with an empty name
 *  2. "ensemble" → "center", whatever the table says
 *  3. exact normalised match, in table order
 *  4. prefix match (name starts with a table entry), in table order
 *  5. bare "left" / "center" / "right"
 *
 * Returns "" when nothing matches, or when the table is absent or empty.
 */
export function mapModelToPerspective(
  modelName: string,
  table: readonly PerspectiveEntry[] | null | undefined,
): string {
  if (!table || table.length === 0) return "";

  const name = normalizeModelName(modelName);

  if (name === "") {
    const entry = table.find((e) => normalizeModelName(e.modelName) === "");
    return entry ? entry.perspective.trim().toLowerCase() : "";
  }

  if (name === ENSEMBLE_MODEL) return "center";

  const normalizedTable = table.map((e) => ({ name: normalizeModelName(e.modelName), perspective: e.perspective }));

  for (const entry of normalizedTable) {
    if (entry.name === name) return entry.perspective.trim().toLowerCase();
  }

  for (const entry of normalizedTable) {
    // Deliberately skip empty-named entries here: as a prefix they would match every model
    if (entry.name !== "" && name.startsWith(entry.name)) return entry.perspective.trim().toLowerCase();
  }

  if (isPerspective(name)) return name;

  return "";
}
