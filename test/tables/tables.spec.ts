// test/tables/tables.spec.ts
// Type, reference, action and property tables

import { describe, it, expect } from "vitest";
import {
  OBJECT_KINDS,
  actionCode,
  actionKeywordForCode,
  defaultParentFor,
  hierarchyOf,
  isDefaultValue,
  isWhitelistedProperty,
  normalizeReference,
  normalizeType,
  typeName,
} from "../../src/tables";

describe("normalizeType", () => {
  it("maps synonyms to canonical kinds", () => {
    expect(normalizeType("Actor-Mixer")).toEqual({ tag: "known", value: "ActorMixer" });
    expect(normalizeType("Random Sequence Container")).toEqual({ tag: "known", value: "RandomSequenceContainer" });
    expect(normalizeType("SequenceContainer")).toEqual({ tag: "known", value: "RandomSequenceContainer" });
    expect(normalizeType("RTPC")).toEqual({ tag: "known", value: "GameParameter" });
    expect(normalizeType("SoundSFX")).toEqual({ tag: "known", value: "Sound" });
    expect(normalizeType("AuxiliaryBus")).toEqual({ tag: "known", value: "AuxBus" });
  });

  it("falls back to a compact key ignoring case, spaces, hyphens and underscores", () => {
    expect(normalizeType("actor_mixer")).toEqual({ tag: "known", value: "ActorMixer" });
    expect(normalizeType("switch container")).toEqual({ tag: "known", value: "SwitchContainer" });
    expect(normalizeType("WORK-UNIT")).toEqual({ tag: "known", value: "WorkUnit" });
  });

  it("passes unknown tokens through as unrecognized", () => {
    expect(normalizeType("Synthesizer")).toEqual({ tag: "unrecognized", value: "Synthesizer" });
    expect(typeName("Synthesizer")).toBe("Synthesizer");
  });

  it("is idempotent over every canonical kind", () => {
    for (const kind of OBJECT_KINDS) {
      expect(normalizeType(kind)).toEqual({ tag: "known", value: kind });
      expect(typeName(typeName(kind))).toBe(kind);
    }
  });
});

describe("normalizeReference", () => {
  it("maps Bus and SwitchGroup synonyms", () => {
    expect(normalizeReference("Bus")).toEqual({ tag: "known", value: "OutputBus" });
    expect(normalizeReference("SwitchGroup")).toEqual({ tag: "known", value: "SwitchGroupOrStateGroup" });
    expect(normalizeReference("output bus")).toEqual({ tag: "known", value: "OutputBus" });
  });

  it("reports unknown slots", () => {
    expect(normalizeReference("Bogus")).toEqual({ tag: "unrecognized", value: "Bogus" });
  });
});

describe("actions", () => {
  it("resolves keywords in any case", () => {
    expect(actionCode("Play")).toBe(1);
    expect(actionCode("SETSWITCH")).toBe(19);
    expect(actionCode("resetgameparameter")).toBe(20);
    expect(actionCode("explode")).toBeUndefined();
  });

  it("decodes stored codes, unknown ones to PLAY", () => {
    expect(actionKeywordForCode("2")).toBe("STOP");
    expect(actionKeywordForCode(18)).toBe("SETSTATE");
    expect(actionKeywordForCode("99")).toBe("PLAY");
  });
});

describe("hierarchies", () => {
  it("places kinds in their hierarchy", () => {
    expect(hierarchyOf("Sound")).toBe("Actor-Mixer Hierarchy");
    expect(hierarchyOf("Event")).toBe("Events");
    expect(hierarchyOf("Folder")).toBeUndefined();
    expect(defaultParentFor("Event")).toBe("\\Events\\Default Work Unit");
    expect(defaultParentFor("Bus")).toBe("\\Master-Mixer Hierarchy\\Default Work Unit\\Master Audio Bus");
    expect(defaultParentFor("Folder")).toBe("\\Actor-Mixer Hierarchy\\Default Work Unit");
  });
});

describe("properties", () => {
  it("checks the whitelist", () => {
    expect(isWhitelistedProperty("Volume")).toBe(true);
    expect(isWhitelistedProperty("3DSpatialization")).toBe(false);
  });

  it("compares defaults numerically and case-insensitively", () => {
    expect(isDefaultValue("Volume", "0.0")).toBe(true);
    expect(isDefaultValue("Volume", "-3")).toBe(false);
    expect(isDefaultValue("Priority", "50")).toBe(true);
    expect(isDefaultValue("Inclusion", "true")).toBe(true);
    expect(isDefaultValue("Color", "0")).toBe(false);
  });
});
