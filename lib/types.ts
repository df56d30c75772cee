export type Direction = "left" | "right";

export function invert(dir: Direction): Direction {
  return dir === "left" ? "right" : "left";
}

// --------------------------------

export type Word = bigint;

export const WORD_MIN: Word = -(2n ** 63n);
export const WORD_MAX: Word = 2n ** 63n - 1n;

export function wrap(val: bigint): Word {
  return BigInt.asIntN(64, val);
}

export function toWord(text: string): Word | null {
  if (!/^[+-]?\d+$/.test(text)) {
    return null;
  }
  const val = BigInt(text);
  if (val < WORD_MIN || WORD_MAX < val) {
    return null;
  }
  return val;
}

export function fromBool(cond: boolean): Word {
  return cond ? 1n : 0n;
}

// --------------------------------

export class Instruction {
  op: string;
  dir: Direction;
  label: string | null;

  constructor(op: string, dir: Direction, label: string | null = null) {
    this.op = op;
    this.dir = dir;
    this.label = label;
  }

  isLabel(): boolean {
    return this.label !== null;
  }

  toToken(): string {
    if (this.label !== null) {
      return `${this.label}:`;
    }
    return this.dir === "left" ? `!${this.op}` : `${this.op}!`;
  }

  static label(name: string): Instruction {
    return new Instruction("label", "left", name);
  }
}

export type LabelTable = Map<string, number>;

export interface Program {
  insns: Instruction[];
  labels: LabelTable;
}
