// src/project/wwu.ts
// Work-unit (.wwu) XML loader
//
// A work-unit document looks like:
//   <WwiseDocument Type="WorkUnit">
//     <AudioObjects>
//       <WorkUnit Name="Default Work Unit">
//         <ChildrenList> ...objects... </ChildrenList>
//
// Objects carry PropertyList / ReferenceList / ChildrenList, and switch
// containers a SwitchAssignmentList of ChildRef/StateRef pairs.

import * as fs from "fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { Hierarchy } from "../tables/kinds";
import {
  objectNode,
  type ObjectNode,
  type ObjectProperty,
  type ObjectReference,
  type ProjectDocument,
  type SwitchAssignment,
} from "./tree";

// ─────────────────────────────────────────────────────────────────
// Generic XML element view
// ─────────────────────────────────────────────────────────────────

export interface XmlElement {
  tag: string;
  attrs: Record<string, string>;
  children: XmlElement[];
}

const ATTR_PREFIX = "@_";

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  preserveOrder: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  parseAttributeValue: false,
  trimValues: true,
});

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readAttrs(raw: unknown): Record<string, string> {
  const attrs: Record<string, string> = {};
  if (!isRecord(raw)) return attrs;
  for (const [key, value] of Object.entries(raw)) {
    if (!key.startsWith(ATTR_PREFIX)) continue;
    attrs[key.slice(ATTR_PREFIX.length)] = String(value);
  }
  return attrs;
}

/**
 * Convert fast-xml-parser's ordered output (arrays of `{tag: children, ":@": attrs}`)
 * into XmlElement trees. Text nodes are dropped.
 */
function toElements(nodes: unknown): XmlElement[] {
  if (!Array.isArray(nodes)) return [];
  const out: XmlElement[] = [];
  for (const node of nodes) {
    if (!isRecord(node)) continue;
    const attrs = readAttrs(node[":@"]);
    for (const [key, value] of Object.entries(node)) {
      if (key === ":@" || key === "#text") continue;
      out.push({ tag: key, attrs, children: toElements(value) });
    }
  }
  return out;
}

export function parseXml(xml: string, source = "<string>"): XmlElement[] {
  const check = XMLValidator.validate(xml);
  if (check !== true) {
    throw new Error(`XML parse error in ${source} (line ${check.err.line}): ${check.err.msg}`);
  }
  const parsed: unknown = parser.parse(xml);
  return toElements(parsed);
}

function childrenByTag(el: XmlElement, tag: string): XmlElement[] {
  return el.children.filter(c => c.tag === tag);
}

function firstChild(el: XmlElement, tag: string): XmlElement | undefined {
  return el.children.find(c => c.tag === tag);
}

/**
 * Depth-first search that does not descend into nested ChildrenList elements,
 * so a container never picks up its descendants' data.
 */
function findOwn(el: XmlElement, tag: string): XmlElement | undefined {
  for (const child of el.children) {
    if (child.tag === tag) return child;
    if (child.tag === "ChildrenList") continue;
    const nested = findOwn(child, tag);
    if (nested) return nested;
  }
  return undefined;
}

// ─────────────────────────────────────────────────────────────────
// Object conversion
// ─────────────────────────────────────────────────────────────────

const CATEGORY_HIERARCHY: Record<string, Hierarchy> = {
  AudioObjects: "Actor-Mixer Hierarchy",
  Busses: "Master-Mixer Hierarchy",
  Events: "Events",
  GameParameters: "Game Parameters",
  SwitchGroups: "Switches",
  Switches: "Switches",
  StateGroups: "States",
  States: "States",
  Attenuations: "Attenuations",
  Effects: "Effects",
};

function readProperties(el: XmlElement): ObjectProperty[] {
  const list = firstChild(el, "PropertyList");
  if (!list) return [];
  const props: ObjectProperty[] = [];
  for (const prop of childrenByTag(list, "Property")) {
    const name = prop.attrs.Name;
    const value = prop.attrs.Value;
    if (name === undefined || value === undefined) continue;
    props.push({ name, value });
  }
  return props;
}

function readReferences(el: XmlElement): ObjectReference[] {
  const list = firstChild(el, "ReferenceList");
  if (!list) return [];
  const refs: ObjectReference[] = [];
  for (const ref of childrenByTag(list, "Reference")) {
    const slot = ref.attrs.Name;
    const target = firstChild(ref, "ObjectRef");
    const targetName = target?.attrs.Name;
    if (slot === undefined || targetName === undefined) continue;
    const entry: ObjectReference = { slot, targetName };
    const targetId = target?.attrs.ID;
    if (targetId !== undefined) entry.targetId = targetId;
    refs.push(entry);
  }
  return refs;
}

function readAssignments(el: XmlElement): SwitchAssignment[] {
  const list = findOwn(el, "SwitchAssignmentList");
  if (!list) return [];
  const out: SwitchAssignment[] = [];
  for (const assignment of childrenByTag(list, "Assignment")) {
    const child = firstChild(assignment, "ChildRef")?.attrs.Name;
    const state = firstChild(assignment, "StateRef")?.attrs.Name;
    if (child && state) out.push({ child, state });
  }
  return out;
}

/**
 * Convert one object element. Elements without a Name are not objects;
 * event actions are the one kind stored with an empty name.
 */
export function elementToNode(el: XmlElement): ObjectNode | undefined {
  const name = el.attrs.Name;
  if (name === undefined || (name === "" && el.tag !== "Action")) return undefined;

  const children: ObjectNode[] = [];
  const list = firstChild(el, "ChildrenList");
  if (list) {
    for (const childEl of list.children) {
      const child = elementToNode(childEl);
      if (child) children.push(child);
    }
  }

  return objectNode(el.tag, name, {
    id: el.attrs.ID,
    properties: readProperties(el),
    references: readReferences(el),
    assignments: el.tag === "SwitchContainer" ? readAssignments(el) : [],
    children,
  });
}

/**
 * Load a work-unit document from XML text.
 * Top-level WorkUnit elements of each category become roots; a document with
 * no category element contributes its root's named children instead.
 */
export function loadWorkUnitXml(xml: string, source: string): ProjectDocument {
  const top = parseXml(xml, source);
  const documentEl = top.find(el => el.tag === "WwiseDocument") ?? top[0];
  if (!documentEl) {
    return { source, roots: [] };
  }

  const roots: ObjectNode[] = [];
  let hierarchy: Hierarchy | undefined;

  for (const category of documentEl.children) {
    const mapped = CATEGORY_HIERARCHY[category.tag];
    if (mapped === undefined) continue;
    hierarchy ??= mapped;
    for (const el of category.children) {
      const node = elementToNode(el);
      if (node) roots.push(node);
    }
  }

  if (roots.length === 0) {
    for (const el of documentEl.children) {
      const node = elementToNode(el);
      if (node) roots.push(node);
    }
  }

  const doc: ProjectDocument = { source, roots };
  if (hierarchy) doc.hierarchy = hierarchy;
  return doc;
}

export function loadWorkUnitFile(filePath: string): ProjectDocument {
  const xml = fs.readFileSync(filePath, "utf8");
  return loadWorkUnitXml(xml, filePath);
}
