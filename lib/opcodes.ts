import { NonIntegerInput, RuntimeExit } from "./errors.ts"
import type { Dqvm } from "./vm.ts"

import {
  fromBool,
  toWord,
  wrap,
  type Direction,
  type Word
} from "./types.ts"

/**
 * What the engine does with the instruction pointer after a handler runs:
 * advance it, keep the value a jump stored, or stop the run.
 */
export type Flow = "next" | "jump" | "halt";

export type Handler = (vm: Dqvm, dir: Direction) => Flow;

const SPACE = 32n;

// Pops a (top) then b, pushes f(a, b) back to the same end.
function binary(f: (a: Word, b: Word) => Word): Handler {
  return (vm, dir) => {
    const a = vm.pop(dir);
    const b = vm.pop(dir);
    vm.push(dir, f(a, b));
    return "next";
  };
}

function unary(f: (a: Word) => Word): Handler {
  return (vm, dir) => {
    vm.push(dir, f(vm.pop(dir)));
    return "next";
  };
}

function shiftAmount(a: Word): Word {
  return a & 63n;
}

// --------------------------------

function swap(vm: Dqvm, dir: Direction): Flow {
  const a = vm.pop(dir);
  const b = vm.pop(dir);
  vm.push(dir, a);
  vm.push(dir, b);
  return "next";
}

function over(vm: Dqvm, dir: Direction): Flow {
  const a = vm.pop(dir);
  const b = vm.pop(dir);
  vm.push(dir, b);
  vm.push(dir, a);
  vm.push(dir, b);
  return "next";
}

function dup(vm: Dqvm, dir: Direction): Flow {
  const a = vm.pop(dir);
  vm.push(dir, a);
  vm.push(dir, a);
  return "next";
}

function move(vm: Dqvm, dir: Direction): Flow {
  vm.move(dir);
  return "next";
}

function drop(vm: Dqvm, dir: Direction): Flow {
  vm.pop(dir);
  return "next";
}

function print(vm: Dqvm, dir: Direction): Flow {
  vm.io.write(`${vm.pop(dir)}\n`);
  return "next";
}

function printc(vm: Dqvm, dir: Direction): Flow {
  vm.io.writeByte(Number(vm.pop(dir) & 0xffn));
  return "next";
}

function read(vm: Dqvm, dir: Direction): Flow {
  const line = vm.io.readLine();
  const val = line === null ? null : toWord(line.trim());
  if (val === null) {
    throw new NonIntegerInput(line);
  }
  vm.push(dir, val);
  return "next";
}

function readc(vm: Dqvm, dir: Direction): Flow {
  const line = vm.io.readLine() ?? "";
  const code = line.codePointAt(0);
  vm.push(dir, code === undefined ? SPACE : BigInt(code));
  return "next";
}

function trace(vm: Dqvm, _dir: Direction): Flow {
  vm.io.write(vm.mem.dumpTrace() + "\n");
  return "next";
}

function jmp(vm: Dqvm, dir: Direction): Flow {
  return vm.jump(vm.pop(dir));
}

function jmpif(vm: Dqvm, dir: Direction): Flow {
  const addr = vm.pop(dir);
  const cond = vm.pop(dir);
  if (cond !== 0n) {
    return vm.jump(addr);
  }
  return "next";
}

function exit(vm: Dqvm, dir: Direction): Flow {
  const code = vm.pop(dir);
  vm.halt();
  if (code !== 0n) {
    throw new RuntimeExit(code);
  }
  return "halt";
}

function label(_vm: Dqvm, _dir: Direction): Flow {
  return "next";
}

// --------------------------------

export const OPCODES = new Map<string, Handler>([
  ["add"    , binary((a, b) => wrap(a + b))],
  ["sub"    , binary((a, b) => wrap(b - a))],
  ["shr"    , binary((a, b) => b >> shiftAmount(a))],
  ["shl"    , binary((a, b) => wrap(b << shiftAmount(a)))],
  ["eq"     , binary((a, b) => fromBool(a === b))],
  ["or"     , binary((a, b) => a | b)],
  ["and"    , binary((a, b) => a & b)],
  ["xor"    , binary((a, b) => a ^ b)],
  [">"      , binary((a, b) => fromBool(b > a))],
  ["<"      , binary((a, b) => fromBool(b < a))],
  [">="     , binary((a, b) => fromBool(b >= a))],
  ["<="     , binary((a, b) => fromBool(b <= a))],
  ["not"    , unary(a => ~a)],

  ["swap"   , swap],
  ["over"   , over],
  ["dup"    , dup],
  ["move"   , move],
  ["drop"   , drop],

  ["print"  , print],
  ["printc" , printc],
  ["read"   , read],
  ["readc"  , readc],
  ["trace"  , trace],

  ["jmp"    , jmp],
  ["jmpif"  , jmpif],
  ["exit"   , exit],
  ["label"  , label],
]);
