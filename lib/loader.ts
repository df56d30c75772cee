import { ParseError } from "./errors.ts"

import {
  Instruction,
  type LabelTable,
  type Program
} from "./types.ts"

export function tokenize(src: string): string[] {
  return src.split(/\s+/).filter(token => token !== "");
}

// The token index is the instruction address: label definitions stay in
// the instruction stream as no-ops.
function toInstruction(token: string, addr: number, labels: LabelTable): Instruction {
  if (token.endsWith(":")) {
    const name = token.slice(0, -1);
    const key = name.toLowerCase();
    if (labels.has(key)) {
      throw new ParseError(token, addr, "Duplicate label");
    }
    labels.set(key, addr);
    return Instruction.label(name);
  } else if (token.startsWith("!")) {
    return new Instruction(token.slice(1), "left");
  } else if (token.endsWith("!")) {
    return new Instruction(token.slice(0, -1), "right");
  } else {
    throw new ParseError(token, addr, "Missing direction marker");
  }
}

export function load(src: string): Program {
  const labels: LabelTable = new Map();
  const insns = tokenize(src).map((token, addr) => toInstruction(token, addr, labels));
  return { insns, labels };
}

export function serialize(program: Program): string {
  return program.insns.map(insn => insn.toToken()).join("\n");
}
