// src/tables/types.ts
// DSL type token and reference keyword normalization

import type { ObjectKind } from "./kinds";

/**
 * Result of a table lookup. Unmatched input is kept verbatim so callers can warn instead of abort.
 */
export type Normalized<T extends string> =
  | { tag: "known"; value: T }
  | { tag: "unrecognized"; value: string };

const TYPE_TABLE: Record<string, ObjectKind> = {
  // containers
  "Actor-Mixer": "ActorMixer",
  ActorMixer: "ActorMixer",
  "Random Sequence Container": "RandomSequenceContainer",
  RandomSequenceContainer: "RandomSequenceContainer",
  RandomContainer: "RandomSequenceContainer",
  SequenceContainer: "RandomSequenceContainer",
  "Switch Container": "SwitchContainer",
  SwitchContainer: "SwitchContainer",
  "Blend Container": "BlendContainer",
  BlendContainer: "BlendContainer",
  Folder: "Folder",
  "Work Unit": "WorkUnit",
  WorkUnit: "WorkUnit",

  // logic
  "Switch Group": "SwitchGroup",
  SwitchGroup: "SwitchGroup",
  Switch: "Switch",
  "State Group": "StateGroup",
  StateGroup: "StateGroup",
  State: "State",
  "Game Parameter": "GameParameter",
  GameParameter: "GameParameter",
  RTPC: "GameParameter",

  // core resources
  Event: "Event",
  Action: "Action",
  Sound: "Sound",
  SoundSFX: "Sound",
  SoundVoice: "Sound",
  Bus: "Bus",
  AudioBus: "Bus",
  "Aux Bus": "AuxBus",
  AuxBus: "AuxBus",
  AuxiliaryBus: "AuxBus",

  // effects and shared sets
  Effect: "Effect",
  AcousticTexture: "AcousticTexture",
  Attenuation: "Attenuation",
};

export type ReferenceSlot =
  | "OutputBus"
  | "Target"
  | "SwitchGroupOrStateGroup"
  | "StateGroup"
  | "Attenuation"
  | "Effect0"
  | "Effect1"
  | "Effect2"
  | "Effect3"
  | "GameParameter"
  | "Conversion"
  | "UserAuxSend0"
  | "UserAuxSend1";

const REFERENCE_TABLE: Record<string, ReferenceSlot> = {
  OutputBus: "OutputBus",
  Bus: "OutputBus",
  Target: "Target",
  SwitchGroupOrStateGroup: "SwitchGroupOrStateGroup",
  SwitchGroup: "SwitchGroupOrStateGroup",
  StateGroup: "StateGroup",
  Attenuation: "Attenuation",
  Effect0: "Effect0",
  Effect1: "Effect1",
  Effect2: "Effect2",
  Effect3: "Effect3",
  GameParameter: "GameParameter",
  Conversion: "Conversion",
  UserAuxSend0: "UserAuxSend0",
  UserAuxSend1: "UserAuxSend1",
};

function compactKey(token: string): string {
  return token.toLowerCase().replace(/[\s\-_]+/g, "");
}

function buildCompactIndex<T extends string>(table: Record<string, T>): Map<string, T> {
  const index = new Map<string, T>();
  for (const [key, value] of Object.entries(table)) {
    index.set(compactKey(key), value);
  }
  return index;
}

const TYPE_INDEX = buildCompactIndex(TYPE_TABLE);
const REFERENCE_INDEX = buildCompactIndex(REFERENCE_TABLE);

function lookup<T extends string>(table: Record<string, T>, index: Map<string, T>, token: string): Normalized<T> {
  const trimmed = token.trim();
  if (Object.prototype.hasOwnProperty.call(table, trimmed)) {
    return { tag: "known", value: table[trimmed] };
  }
  const loose = index.get(compactKey(trimmed));
  if (loose !== undefined) {
    return { tag: "known", value: loose };
  }
  return { tag: "unrecognized", value: token };
}

export function normalizeType(token: string): Normalized<ObjectKind> {
  return lookup(TYPE_TABLE, TYPE_INDEX, token);
}

export function normalizeReference(token: string): Normalized<ReferenceSlot> {
  return lookup(REFERENCE_TABLE, REFERENCE_INDEX, token);
}

/** Canonical kind, or the token itself when unknown. */
export function typeName(token: string): string {
  return normalizeType(token).value;
}
