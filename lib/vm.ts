import { Deque } from "./deque.ts"
import { StackUnderflow, UnknownLabel } from "./errors.ts"
import type { Io } from "./io.ts"
import { load } from "./loader.ts"
import { OPCODES, type Flow } from "./opcodes.ts"
import { puts_e, type Logger } from "./utils.ts"

import {
  invert,
  toWord,
  type Direction,
  type Instruction,
  type LabelTable,
  type Program,
  type Word
} from "./types.ts"

export class Memory {
  main: Instruction[];
  labels: LabelTable;
  data: Deque<Word>;

  readonly MAIN_DUMP_WIDTH = 8;

  constructor(program: Program) {
    this.main = program.insns;
    this.labels = program.labels;
    this.data = new Deque();
  }

  _dumpMain_head(addr: number, pc: number): string {
    if (addr === pc) {
      return "pc =>";
    } else {
      return "     ";
    }
  }

  _dumpMain_indent(insn: Instruction): string {
    return insn.isLabel() ? "" : "  ";
  }

  dumpMain(pc: number) {
    return this.main
      .map((insn, addr) => ({ insn, addr }))
      .filter(({ addr }) =>
              pc - this.MAIN_DUMP_WIDTH <= addr &&
              addr <= pc + this.MAIN_DUMP_WIDTH
             )
      .map(({ insn, addr }) => {
        return [
          this._dumpMain_head(addr, pc),
          " " + addr,
          " " + this._dumpMain_indent(insn),
          insn.toToken(),
        ].join("");
      })
      .join("\n");
  }

  dumpData() {
    const vals = this.data.toArray().map(val => val.toString());
    return `L [ ${vals.join(", ")} ] R`;
  }

  // One glyph per element, front to back.
  dumpTrace() {
    return this.data
      .toArray()
      .map(val => val === 1n ? "*" : " ")
      .join("");
  }
}

export interface VmOptions {
  debug?: boolean;
  log?: Logger;
}

export class Dqvm {
  mem: Memory;
  io: Io;

  pc: number;
  step: number;
  halted: boolean;

  debug: boolean;
  log: Logger;

  constructor(mem: Memory, io: Io, options: VmOptions = {}) {
    this.mem = mem;
    this.io = io;
    this.pc = 0;
    this.step = 0;
    this.halted = false;
    this.debug = options.debug ?? false;
    this.log = options.log ?? puts_e;
  }

  static fromSource(src: string, io: Io, options: VmOptions = {}): Dqvm {
    return new Dqvm(new Memory(load(src)), io, options);
  }

  reset() {
    this.mem.data.clear();
    this.pc = 0;
    this.step = 0;
    this.halted = false;
  }

  pop(dir: Direction): Word {
    const val = dir === "left"
      ? this.mem.data.popFront()
      : this.mem.data.popBack();
    if (val === undefined) {
      throw new StackUnderflow(dir);
    }
    return val;
  }

  push(dir: Direction, val: Word) {
    if (dir === "left") {
      this.mem.data.pushFront(val);
    } else {
      this.mem.data.pushBack(val);
    }
  }

  move(dir: Direction) {
    this.push(invert(dir), this.pop(dir));
  }

  // Targets outside the program end the run.
  jump(addr: Word): Flow {
    const size = this.mem.main.length;
    if (addr < 0n || BigInt(size) < addr) {
      this.pc = size;
    } else {
      this.pc = Number(addr);
    }
    return "jump";
  }

  halt(): Flow {
    this.halted = true;
    return "halt";
  }

  resolve(operand: string): Word {
    const val = toWord(operand);
    if (val !== null) {
      return val;
    }

    const addr = this.mem.labels.get(operand.toLowerCase());
    if (addr === undefined) {
      throw new UnknownLabel(operand);
    }
    return BigInt(addr);
  }

  execute() {
    if (!this.isRunning()) {
      return;
    }

    const insn = this.mem.main[this.pc];
    const handler = OPCODES.get(insn.op);

    let flow: Flow;
    if (handler) {
      flow = handler(this, insn.dir);
    } else {
      this.push(insn.dir, this.resolve(insn.op));
      flow = "next";
    }

    if (flow === "next") {
      this.pc++;
    }
  }

  isRunning(): boolean {
    return !this.halted && this.pc < this.mem.main.length;
  }

  start() {
    if (this.debug) {
      this.dump();
    }

    while (this.isRunning()) {
      this.step++;
      this.execute();

      if (this.debug) {
        this.dump();
      }
    }
  }

  dump() {
    this.log([
      "================================",
      `${ this.step }: pc(${ this.pc }) size(${ this.mem.data.length })`,
      "---- memory (main) ----",
      this.mem.dumpMain(this.pc),
      "---- memory (data) ----",
      this.mem.dumpData(),
    ].join("\n"));
  }
}
