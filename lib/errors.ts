import type { Direction, Word } from "./types.ts"

export class VmError extends Error {
  constructor(msg: string) {
    super(msg);
    this.name = new.target.name;
  }
}

export class ParseError extends VmError {
  token: string;
  addr: number;

  constructor(token: string, addr: number, reason: string) {
    super(`${reason} at ${addr} (${JSON.stringify(token)})`);
    this.token = token;
    this.addr = addr;
  }
}

export class StackUnderflow extends VmError {
  dir: Direction;

  constructor(dir: Direction) {
    super(`Could not pop from ${dir === "left" ? "front" : "back"} of deque.`);
    this.dir = dir;
  }
}

export class UnknownLabel extends VmError {
  label: string;

  constructor(label: string) {
    super(`Label ${label} does not exist.`);
    this.label = label;
  }
}

export class NonIntegerInput extends VmError {
  input: string | null;

  constructor(input: string | null) {
    super(
      input === null
        ? "Expected an integer but reached end of input."
        : `Expected an integer but got ${JSON.stringify(input)}.`
    );
    this.input = input;
  }
}

export class RuntimeExit extends VmError {
  code: Word;

  constructor(code: Word) {
    super(`Exit code ${code}`);
    this.code = code;
  }
}
