// src/dsl/print.ts
// Instruction → DSL text

import type { CurvePoint, Instruction } from "./types";

const q = (s: string) => `"${s}"`;

function printPoints(points: readonly CurvePoint[]): string {
  return `[${points.map(p => `(${p.x}, ${p.y})`).join(", ")}]`;
}

export function printInstruction(ins: Instruction): string {
  switch (ins.kind) {
    case "CREATE":
      return `CREATE ${ins.type} ${q(ins.name)} UNDER ${q(ins.parent)}`;
    case "SET_PROP":
      return `SET_PROP ${q(ins.object)} ${q(ins.property)} = ${ins.value}`;
    case "LINK":
      return `LINK ${q(ins.object)} TO ${q(ins.target)} AS ${q(ins.slot)}`;
    case "ASSIGN":
      return `ASSIGN ${q(ins.child)} TO ${q(ins.target)}`;
    case "ADD_ACTION": {
      const base = `ADD_ACTION ${q(ins.event)} ${ins.action} ${q(ins.target)}`;
      return ins.value === undefined ? base : `${base} ${q(ins.value)}`;
    }
    case "CREATE_EVENT": {
      const under = ins.parent === undefined ? "" : ` UNDER ${q(ins.parent)}`;
      return `CREATE_EVENT ${q(ins.event)}${under} PLAY ${q(ins.target)}`;
    }
    case "IMPORT_AUDIO": {
      const as = ins.name === undefined ? "" : ` AS ${q(ins.name)}`;
      return `IMPORT_AUDIO ${q(ins.file)} INTO ${q(ins.parent)}${as}`;
    }
    case "SET_RTPC_CURVE":
      return `SET_RTPC_CURVE ${q(ins.object)} ${q(ins.gameParameter)} ${q(ins.property)} POINTS ${printPoints(ins.points)}`;
    case "DELETE":
      return `DELETE ${q(ins.object)}`;
    case "COPY":
      return `COPY ${q(ins.source)} TO ${q(ins.parent)} AS ${q(ins.newName)}`;
    case "MOVE":
      return `MOVE ${q(ins.object)} TO ${q(ins.parent)}`;
    case "RENAME":
      return `RENAME ${q(ins.object)} TO ${q(ins.newName)}`;
  }
}
