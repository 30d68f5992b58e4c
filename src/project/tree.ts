// src/project/tree.ts
// In-memory model of a project object tree

import type { Hierarchy } from "../tables/kinds";

export interface ObjectProperty {
  name: string;
  value: string;
}

export interface ObjectReference {
  /** Reference slot as stored by the project (e.g. "OutputBus", "Effect0"). */
  slot: string;
  targetName: string;
  targetId?: string;
}

/** Switch container child-to-state assignment. */
export interface SwitchAssignment {
  child: string;
  state: string;
}

/**
 * One object of the project tree. `kind` is the stored element name,
 * which may fall outside the canonical kind set.
 */
export interface ObjectNode {
  kind: string;
  name: string;
  id?: string;
  properties: ObjectProperty[];
  references: ObjectReference[];
  assignments: SwitchAssignment[];
  children: ObjectNode[];
}

/**
 * Top-level objects of one work-unit document, with the hierarchy they belong to.
 */
export interface ProjectDocument {
  source: string;
  hierarchy?: Hierarchy;
  roots: ObjectNode[];
}

export type ObjectNodeInit = Partial<Omit<ObjectNode, "kind" | "name">>;

export function objectNode(kind: string, name: string, init: ObjectNodeInit = {}): ObjectNode {
  const node: ObjectNode = {
    kind,
    name,
    properties: init.properties ?? [],
    references: init.references ?? [],
    assignments: init.assignments ?? [],
    children: init.children ?? [],
  };
  if (init.id !== undefined) node.id = init.id;
  return node;
}

export function joinPath(parentPath: string, name: string): string {
  return `${parentPath}\\${name}`;
}

/**
 * Visit nodes parent-first, children in stored order.
 */
export function walkPreOrder(
  node: ObjectNode,
  visit: (node: ObjectNode, path: string, depth: number) => void,
  parentPath = "",
  depth = 0
): void {
  const path = joinPath(parentPath, node.name);
  visit(node, path, depth);
  for (const child of node.children) {
    walkPreOrder(child, visit, path, depth + 1);
  }
}
