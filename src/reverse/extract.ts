// src/reverse/extract.ts
// Reverse compiler: object tree → self-contained DSL samples

import * as path from "path";
import { printInstruction } from "../dsl/print";
import type { Instruction } from "../dsl/types";
import type { ObjectNode, ProjectDocument } from "../project/tree";
import { classifyComplexity, countCommands, type SampleCommands } from "./complexity";
import { nodeInstructions, type EmitOptions } from "./emit";
import type { ExtractedSample } from "./sample";

export interface ReverseOptions {
  /** Treat leaf sounds as samples of their own. */
  includeSounds?: boolean;
  /** Leave out properties still at their default value. */
  skipDefaults?: boolean;
}

export interface ReverseStats {
  creates: number;
  setProps: number;
  links: number;
  assigns: number;
  actions: number;
}

const SAMPLE_ROOT_KINDS: ReadonlySet<string> = new Set([
  "RandomSequenceContainer",
  "SwitchContainer",
  "BlendContainer",
  "ActorMixer",
  "Event",
  "Bus",
  "AuxBus",
  "SwitchGroup",
  "StateGroup",
  "GameParameter",
  "Attenuation",
]);

function emptyStats(): ReverseStats {
  return { creates: 0, setProps: 0, links: 0, assigns: 0, actions: 0 };
}

/** Name a LINK or ADD_ACTION line depends on. */
function dependencyOf(ins: Instruction): string | undefined {
  if (ins.kind === "LINK" || ins.kind === "ADD_ACTION") return ins.target;
  return undefined;
}

/**
 * Move LINK / ADD_ACTION lines whose target is created further down the
 * sample to its end, keeping their relative order.
 */
export function orderForUse(instructions: readonly Instruction[]): Instruction[] {
  const createdAt = new Map<string, number>();
  instructions.forEach((ins, i) => {
    if (ins.kind === "CREATE" && !createdAt.has(ins.name)) createdAt.set(ins.name, i);
  });

  const head: Instruction[] = [];
  const tail: Instruction[] = [];
  instructions.forEach((ins, i) => {
    const dep = dependencyOf(ins);
    const at = dep === undefined ? undefined : createdAt.get(dep);
    if (at !== undefined && at > i) tail.push(ins);
    else head.push(ins);
  });
  return [...head, ...tail];
}

export class ReverseCompiler {
  private readonly includeSounds: boolean;
  private readonly emitOptions: EmitOptions;
  private stats: ReverseStats = emptyStats();

  constructor(options: ReverseOptions = {}) {
    this.includeSounds = options.includeSounds ?? false;
    this.emitOptions = { skipDefaults: options.skipDefaults ?? true };
  }

  getStats(): ReverseStats {
    return { ...this.stats };
  }

  resetStats(): void {
    this.stats = emptyStats();
  }

  isSampleRoot(kind: string): boolean {
    return SAMPLE_ROOT_KINDS.has(kind) || (this.includeSounds && kind === "Sound");
  }

  /**
   * Samples for every sample-root node at or below `root`, in pre-order.
   */
  extractSamples(root: ObjectNode, parentName = "Default Work Unit", source = ""): ExtractedSample[] {
    const out: ExtractedSample[] = [];
    this.collect(root, parentName, source, out);
    return out;
  }

  extractDocument(doc: ProjectDocument): ExtractedSample[] {
    const source = path.basename(doc.source);
    const parentName = doc.hierarchy === undefined ? "Root" : "Default Work Unit";
    return doc.roots.flatMap(root => this.extractSamples(root, parentName, source));
  }

  private collect(node: ObjectNode, parentName: string, source: string, out: ExtractedSample[]): void {
    if (!node.name) return;

    if (this.isSampleRoot(node.kind)) {
      const { instructions, depth } = this.subtree(node, parentName, 0);
      if (instructions.length > 0) {
        out.push(this.makeSample(node, orderForUse(instructions), depth, source));
      }
    }

    for (const child of node.children) {
      if (child.kind !== "Action") this.collect(child, node.name, source, out);
    }
  }

  private subtree(node: ObjectNode, parentName: string, depth: number): { instructions: Instruction[]; depth: number } {
    const own = nodeInstructions(node, parentName, this.emitOptions);
    const instructions = [...own.lines];
    let maxDepth = depth;

    for (const child of node.children) {
      if (child.kind === "Action") continue;
      const sub = this.subtree(child, node.name, depth + 1);
      instructions.push(...sub.instructions);
      maxDepth = Math.max(maxDepth, sub.depth);
    }

    instructions.push(...own.assignments);
    return { instructions, depth: maxDepth };
  }

  private makeSample(node: ObjectNode, instructions: Instruction[], depth: number, source: string): ExtractedSample {
    const lines = instructions.map(printInstruction);
    const commands = countCommands(instructions);
    this.record(commands);
    return {
      instructions,
      lines,
      rootKind: node.kind,
      rootName: node.name,
      depth,
      commands,
      complexity: classifyComplexity(commands, lines.length, depth),
      source,
    };
  }

  private record(commands: SampleCommands): void {
    this.stats.creates += commands.CREATE;
    this.stats.setProps += commands.SET_PROP;
    this.stats.links += commands.LINK;
    this.stats.assigns += commands.ASSIGN;
    this.stats.actions += commands.ADD_ACTION;
  }
}
