// src/compiler/resolve.ts
// Parent and reference-target resolution against a partially qualified name space

import {
  CONTAINER_KINDS,
  MASTER_BUS_PATH,
  defaultParentFor,
  defaultWorkUnitPath,
  hierarchyOf,
  isHierarchy,
  legalParentKinds,
  type Hierarchy,
} from "../tables/kinds";
import { joinPath } from "../project/tree";
import { rootOfPath } from "../registry/registry";
import type { ProjectLookup } from "../registry/types";
import { WAAPI, type PlanStep } from "./plan";

/**
 * How a parent reference was settled. `value` is what goes into the plan.
 */
export type ParentResolution =
  | { tag: "verbatim"; value: string }
  | { tag: "alias"; value: string }
  | { tag: "registry"; value: string }
  | { tag: "query"; value: string }
  | { tag: "name"; value: string };

export function isIdentifier(raw: string): boolean {
  return raw.startsWith("{") && raw.endsWith("}");
}

/** Absolute path, opaque identifier or query expression. */
export function isVerbatimPath(raw: string): boolean {
  return raw.startsWith("\\") || raw.startsWith("$") || isIdentifier(raw);
}

const MASTER_ALIASES: ReadonlySet<string> = new Set(["master", "master audio bus", "master-mixer hierarchy"]);

const HIERARCHY_ALIASES: Readonly<Record<string, Hierarchy>> = {
  "actor-mixer": "Actor-Mixer Hierarchy",
  "actor-mixer hierarchy": "Actor-Mixer Hierarchy",
  events: "Events",
  switches: "Switches",
  states: "States",
  attenuations: "Attenuations",
  "game parameters": "Game Parameters",
  effects: "Effects",
};

/**
 * Fixed locations for canonical names such as "Default Work Unit" or "Master".
 */
export function resolveAlias(raw: string, childKind: string): string | undefined {
  const key = raw.trim().toLowerCase();
  if (key === "default work unit" || key === "root") {
    return defaultParentFor(childKind);
  }
  if (MASTER_ALIASES.has(key)) {
    return MASTER_BUS_PATH;
  }
  const hierarchy = HIERARCHY_ALIASES[key];
  return hierarchy === undefined ? undefined : defaultWorkUnitPath(hierarchy);
}

/**
 * Among several same-named candidates, take the most recently registered
 * container; fall back to the first registered.
 */
export function preferContainer(lookup: ProjectLookup, candidates: readonly string[]): string | undefined {
  for (let i = candidates.length - 1; i >= 0; i--) {
    const kind = lookup.kindOf(candidates[i]);
    if (kind !== undefined && CONTAINER_KINDS.has(kind)) return candidates[i];
  }
  return candidates[0];
}

/**
 * Registry candidates for a parent name, restricted to the child's hierarchy.
 * Candidates under an unrecognised root stay in the running; those under
 * \Attenuations only for attenuation children.
 */
export function resolveViaRegistry(lookup: ProjectLookup, raw: string, childKind: string): string | undefined {
  const candidates = lookup.lookupCandidates(raw);
  if (candidates.length === 0) return undefined;

  const wanted = hierarchyOf(childKind);
  const filtered = candidates.filter(path => {
    const root = rootOfPath(path);
    if (root === "Attenuations" && wanted !== "Attenuations") return false;
    return wanted === undefined || root === undefined || !isHierarchy(root) || root === wanted;
  });

  if (filtered.length <= 1) return filtered[0];
  return preferContainer(lookup, filtered);
}

export function typedQuery(raw: string, childKind: string): string | undefined {
  const kinds = legalParentKinds(childKind);
  if (!kinds) return undefined;
  return `$ from type ${kinds.join(",")} where name="${raw}"`;
}

/**
 * Resolve the UNDER operand of a create. First match wins:
 * verbatim, alias, registry, typed query, raw name.
 */
export function resolveParent(raw: string, childKind: string, lookup?: ProjectLookup): ParentResolution {
  if (isVerbatimPath(raw)) return { tag: "verbatim", value: raw };

  const alias = resolveAlias(raw, childKind);
  if (alias !== undefined) return { tag: "alias", value: alias };

  if (lookup) {
    const found = resolveViaRegistry(lookup, raw, childKind);
    if (found !== undefined) return { tag: "registry", value: found };
  }

  const query = typedQuery(raw, childKind);
  if (query !== undefined) return { tag: "query", value: query };

  return { tag: "name", value: raw };
}

/**
 * Parent of an event or an imported sound: verbatim or a fixed alias location,
 * else the name as written. Neither the registry nor a query applies here.
 */
export function resolveFixedParent(raw: string, childKind: string): string {
  if (isVerbatimPath(raw)) return raw;
  return resolveAlias(raw, childKind) ?? raw;
}

// ─────────────────────────────────────────────────────────────────
// Reference targets
// ─────────────────────────────────────────────────────────────────

const SLOT_HIERARCHY: Readonly<Record<string, Hierarchy>> = {
  OutputBus: "Master-Mixer Hierarchy",
  UserAuxSend0: "Master-Mixer Hierarchy",
  UserAuxSend1: "Master-Mixer Hierarchy",
  Attenuation: "Attenuations",
  SwitchGroupOrStateGroup: "Switches",
  StateGroup: "States",
  GameParameter: "Game Parameters",
};

/**
 * Resolve a LINK target. The reference API takes paths, identifiers or names
 * (never queries), so an unresolved target stays a bare name.
 */
export function resolveReferenceTarget(raw: string, slot: string, lookup?: ProjectLookup): string {
  if (isVerbatimPath(raw)) return raw;

  if (slot === "OutputBus" && MASTER_ALIASES.has(raw.trim().toLowerCase())) {
    return MASTER_BUS_PATH;
  }

  if (lookup) {
    const candidates = lookup.lookupCandidates(raw);
    const hint = SLOT_HIERARCHY[slot];
    const hinted = hint === undefined ? undefined : candidates.find(path => rootOfPath(path) === hint);
    const found = hinted ?? candidates[0];
    if (found !== undefined) return found;
  }

  return raw;
}

// ─────────────────────────────────────────────────────────────────
// Assets under plain folders
// ─────────────────────────────────────────────────────────────────

export interface ContentRedirect {
  step: PlanStep;
  parent: string;
}

/**
 * Assets may not sit directly under a plain folder. When the resolved parent
 * is one, create "<rawParent>_Content" work unit inside it and return the
 * redirected parent path.
 */
export function contentWorkUnit(lookup: ProjectLookup, parent: string, rawParent: string): ContentRedirect | undefined {
  const folderPath = isIdentifier(parent)
    ? lookup.pathOf(parent)
    : parent.startsWith("\\") ? parent : undefined;
  if (folderPath === undefined || !lookup.isPlainFolder(folderPath)) return undefined;

  const name = `${rawParent}_Content`;
  return {
    step: {
      action: WAAPI.create,
      args: { type: "WorkUnit", name, parent, onNameConflict: "merge" },
    },
    parent: joinPath(folderPath, name),
  };
}
