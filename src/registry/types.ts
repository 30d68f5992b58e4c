// src/registry/types.ts
// Registry entries and the lookup surface the forward compiler depends on

/**
 * One registered object location.
 */
export interface RegistryEntry {
  /** Full backslash path, e.g. "\\Actor-Mixer Hierarchy\\Default Work Unit\\Weapons". */
  path: string;
  /** Stored kind (canonical kind or the raw element name). */
  kind: string;
  /** Opaque identifier ("{GUID}") when known. */
  id?: string;
  /** Filesystem-like folder outside any logical work unit. */
  plainFolder?: boolean;
}

/**
 * Serialized registry index. Entries are kept in registration order,
 * which the container tie-break depends on.
 */
export interface RegistryIndex {
  entries: RegistryEntry[];
}

/**
 * Read-only view of a registry, as consulted during compilation.
 */
export interface ProjectLookup {
  /** Candidate paths for an object name, in registration order. */
  lookupCandidates(name: string): readonly string[];
  kindOf(path: string): string | undefined;
  isPlainFolder(path: string): boolean;
  /** Path of an opaque identifier. */
  pathOf(id: string): string | undefined;
}
