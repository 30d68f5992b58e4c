// src/tables/kinds.ts
// Object kinds of the audio project tree and the groupings the compilers key on

/**
 * Canonical object kinds.
 * Closed set - every DSL type token normalizes to one of these or is reported as unrecognized.
 */
export type ObjectKind =
  // containers
  | "ActorMixer"
  | "RandomSequenceContainer"
  | "SwitchContainer"
  | "BlendContainer"
  | "Folder"
  | "WorkUnit"
  // assets
  | "Sound"
  // routing
  | "Bus"
  | "AuxBus"
  // logic
  | "SwitchGroup"
  | "Switch"
  | "StateGroup"
  | "State"
  | "GameParameter"
  // events
  | "Event"
  | "Action"
  // auxiliary
  | "Effect"
  | "Attenuation"
  | "AcousticTexture";

export const OBJECT_KINDS: readonly ObjectKind[] = [
  "ActorMixer",
  "RandomSequenceContainer",
  "SwitchContainer",
  "BlendContainer",
  "Folder",
  "WorkUnit",
  "Sound",
  "Bus",
  "AuxBus",
  "SwitchGroup",
  "Switch",
  "StateGroup",
  "State",
  "GameParameter",
  "Event",
  "Action",
  "Effect",
  "Attenuation",
  "AcousticTexture",
];

const KIND_SET: ReadonlySet<string> = new Set(OBJECT_KINDS);

export function isObjectKind(value: string): value is ObjectKind {
  return KIND_SET.has(value);
}

/** Kinds that live in the actor-mixer hierarchy and hold audio. */
export const ASSET_KINDS: ReadonlySet<string> = new Set<ObjectKind>([
  "ActorMixer",
  "Sound",
  "RandomSequenceContainer",
  "SwitchContainer",
  "BlendContainer",
]);

/** Kinds preferred by the container tie-break when a parent name is ambiguous. */
export const CONTAINER_KINDS: ReadonlySet<string> = new Set<ObjectKind>([
  "ActorMixer",
  "RandomSequenceContainer",
  "SwitchContainer",
  "BlendContainer",
  "Folder",
  "WorkUnit",
  "Bus",
  "AuxBus",
]);

// ─────────────────────────────────────────────────────────────────
// Hierarchies
// ─────────────────────────────────────────────────────────────────

export type Hierarchy =
  | "Actor-Mixer Hierarchy"
  | "Master-Mixer Hierarchy"
  | "Events"
  | "Switches"
  | "States"
  | "Game Parameters"
  | "Attenuations"
  | "Effects";

export const HIERARCHIES: readonly Hierarchy[] = [
  "Actor-Mixer Hierarchy",
  "Master-Mixer Hierarchy",
  "Events",
  "Switches",
  "States",
  "Game Parameters",
  "Attenuations",
  "Effects",
];

export function isHierarchy(value: string): value is Hierarchy {
  return HIERARCHIES.some(h => h === value);
}

export const MASTER_BUS_PATH = "\\Master-Mixer Hierarchy\\Default Work Unit\\Master Audio Bus";

export function defaultWorkUnitPath(hierarchy: Hierarchy): string {
  if (hierarchy === "Master-Mixer Hierarchy") return MASTER_BUS_PATH;
  return `\\${hierarchy}\\Default Work Unit`;
}

/**
 * Hierarchy a kind is created in. Folder and WorkUnit can live anywhere.
 */
export function hierarchyOf(kind: string): Hierarchy | undefined {
  switch (kind) {
    case "ActorMixer":
    case "Sound":
    case "RandomSequenceContainer":
    case "SwitchContainer":
    case "BlendContainer":
      return "Actor-Mixer Hierarchy";
    case "Event":
      return "Events";
    case "Bus":
    case "AuxBus":
      return "Master-Mixer Hierarchy";
    case "GameParameter":
      return "Game Parameters";
    case "SwitchGroup":
    case "Switch":
      return "Switches";
    case "StateGroup":
    case "State":
      return "States";
    case "Attenuation":
      return "Attenuations";
    case "Effect":
    case "AcousticTexture":
      return "Effects";
    default:
      return undefined;
  }
}

/**
 * Default location for a child created under "Default Work Unit" or "Root".
 */
export function defaultParentFor(kind: string): string {
  return defaultWorkUnitPath(hierarchyOf(kind) ?? "Actor-Mixer Hierarchy");
}

const ACTOR_MIXER_CHILDREN: ReadonlySet<string> = new Set([
  "ActorMixer",
  "Sound",
  "RandomSequenceContainer",
  "SwitchContainer",
  "BlendContainer",
  "Folder",
  "WorkUnit",
]);

/**
 * Kinds a child may legally be created under, or undefined when unconstrained.
 */
export function legalParentKinds(kind: string): readonly ObjectKind[] | undefined {
  if (ACTOR_MIXER_CHILDREN.has(kind)) {
    return ["WorkUnit", "Folder", "ActorMixer", "RandomSequenceContainer", "SwitchContainer", "BlendContainer"];
  }
  switch (kind) {
    case "Event":
    case "GameParameter":
      return ["WorkUnit", "Folder"];
    case "Bus":
    case "AuxBus":
      return ["WorkUnit", "Folder", "Bus", "AuxBus"];
    case "SwitchGroup":
    case "Switch":
      return ["WorkUnit", "Folder", "SwitchGroup"];
    case "StateGroup":
    case "State":
      return ["WorkUnit", "Folder", "StateGroup"];
    default:
      return undefined;
  }
}
