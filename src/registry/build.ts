// src/registry/build.ts
// Registry construction from loaded project documents

import * as fs from "fs";
import { walkPreOrder, type ProjectDocument } from "../project/tree";
import { ObjectRegistry } from "./registry";

/**
 * Register every object of the given documents.
 *
 * Order is the pre-order walk: documents as given, children in stored order.
 * A path seen twice (the same work unit split across files) keeps its first entry.
 */
export function buildRegistry(documents: readonly ProjectDocument[]): ObjectRegistry {
  const registry = new ObjectRegistry();

  for (const doc of documents) {
    const base = doc.hierarchy ? `\\${doc.hierarchy}` : "";
    for (const root of doc.roots) {
      const insideWorkUnit: boolean[] = [];
      walkPreOrder(root, (node, path, depth) => {
        insideWorkUnit.length = depth;
        const enclosed = insideWorkUnit.some(Boolean);
        insideWorkUnit.push(node.kind === "WorkUnit");

        // Actions are unnamed and only reachable through their event.
        if (node.kind === "Action" || registry.has(path)) return;
        registry.register({
          path,
          kind: node.kind,
          ...(node.id !== undefined ? { id: node.id } : {}),
          ...(node.kind === "Folder" && !enclosed ? { plainFolder: true } : {}),
        });
      }, base);
    }
  }

  return registry;
}

export function loadRegistryFile(filePath: string): ObjectRegistry {
  const data: unknown = JSON.parse(fs.readFileSync(filePath, "utf8"));
  return ObjectRegistry.fromJSON(data);
}
