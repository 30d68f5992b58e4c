// src/registry/registry.ts
// Name → paths index over a project tree

import type { ProjectLookup, RegistryEntry, RegistryIndex } from "./types";

/**
 * Last segment of a backslash path.
 */
export function nameOfPath(path: string): string {
  const i = path.lastIndexOf("\\");
  return i < 0 ? path : path.slice(i + 1);
}

/**
 * First segment of a backslash path (the hierarchy root), or undefined for relative paths.
 */
export function rootOfPath(path: string): string | undefined {
  if (!path.startsWith("\\")) return undefined;
  const rest = path.slice(1);
  const i = rest.indexOf("\\");
  return i < 0 ? rest : rest.slice(0, i);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toEntry(value: unknown, index: number): RegistryEntry {
  if (!isRecord(value)) {
    throw new Error(`Registry entry ${index}: expected an object`);
  }
  const { path, kind, id, plainFolder } = value;
  if (typeof path !== "string" || path.length === 0) {
    throw new Error(`Registry entry ${index}: missing path`);
  }
  if (typeof kind !== "string" || kind.length === 0) {
    throw new Error(`Registry entry ${index}: missing kind`);
  }
  const entry: RegistryEntry = { path, kind };
  if (typeof id === "string") entry.id = id;
  if (plainFolder === true) entry.plainFolder = true;
  return entry;
}

/**
 * Registry of object locations. Built once per run and shared read-only
 * by every compiler instance that receives it.
 */
export class ObjectRegistry implements ProjectLookup {
  private entries: Map<string, RegistryEntry> = new Map();
  private byName: Map<string, string[]> = new Map();
  private byId: Map<string, string> = new Map();

  /**
   * Register an entry. Throws on duplicate paths.
   */
  register(entry: RegistryEntry): void {
    if (this.entries.has(entry.path)) {
      throw new Error(`Path already registered: ${entry.path}`);
    }

    this.entries.set(entry.path, entry);

    const name = nameOfPath(entry.path);
    const paths = this.byName.get(name);
    if (paths) {
      paths.push(entry.path);
    } else {
      this.byName.set(name, [entry.path]);
    }

    if (entry.id) {
      this.byId.set(entry.id, entry.path);
    }
  }

  has(path: string): boolean {
    return this.entries.has(path);
  }

  get(path: string): RegistryEntry | undefined {
    return this.entries.get(path);
  }

  /**
   * All entries in registration order.
   */
  getAll(): RegistryEntry[] {
    return Array.from(this.entries.values());
  }

  get size(): number {
    return this.entries.size;
  }

  lookupCandidates(name: string): readonly string[] {
    return this.byName.get(name) ?? [];
  }

  kindOf(path: string): string | undefined {
    return this.entries.get(path)?.kind;
  }

  isPlainFolder(path: string): boolean {
    return this.entries.get(path)?.plainFolder === true;
  }

  pathOf(id: string): string | undefined {
    return this.byId.get(id);
  }

  idOf(path: string): string | undefined {
    return this.entries.get(path)?.id;
  }

  /**
   * Check entries for consistency.
   */
  validate(): { valid: boolean; errors: string[] } {
    const errors: string[] = [];
    const seenIds = new Map<string, string>();

    for (const entry of this.entries.values()) {
      if (!entry.path.startsWith("\\")) {
        errors.push(`${entry.path}: path is not absolute`);
      }
      if (entry.plainFolder && entry.kind !== "Folder") {
        errors.push(`${entry.path}: plain folder flag on ${entry.kind}`);
      }
      if (entry.id) {
        const other = seenIds.get(entry.id);
        if (other !== undefined) {
          errors.push(`${entry.path}: id ${entry.id} also used by ${other}`);
        } else {
          seenIds.set(entry.id, entry.path);
        }
      }
    }

    return { valid: errors.length === 0, errors };
  }

  toJSON(): RegistryIndex {
    return { entries: this.getAll().map(e => ({ ...e })) };
  }

  /**
   * Hydrate a registry from a parsed index file.
   */
  static fromJSON(data: unknown): ObjectRegistry {
    if (!isRecord(data) || !Array.isArray(data.entries)) {
      throw new Error("Registry index must be an object with an 'entries' array");
    }
    const registry = new ObjectRegistry();
    data.entries.forEach((raw: unknown, i: number) => {
      registry.register(toEntry(raw, i));
    });
    return registry;
  }
}
