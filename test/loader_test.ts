import { test } from "vitest"

import { ParseError } from "../lib/errors.ts"
import { load, serialize, tokenize } from "../lib/loader.ts"
import { assertEquals, assertThrows } from "./asserts.ts"

function summarize(src: string) {
  return load(src).insns.map(insn => [insn.op, insn.dir]);
}

// --------------------------------

test("tokenize splits on any whitespace", ()=>{
  assertEquals(tokenize(" !1\t\n 2!  \r\n"), ["!1", "2!"]);
});

test("tokenize empty source", ()=>{
  assertEquals(tokenize("  \n"), []);
});

// --------------------------------

test("direction markers", ()=>{
  assertEquals(
    summarize("!add 5! !-3"),
    [
      ["add", "left"],
      ["5", "right"],
      ["-3", "left"],
    ]
  );
});

test("leading marker wins over trailing marker", ()=>{
  assertEquals(summarize("!x!"), [["x!", "left"]]);
});

test("label definitions keep their address", ()=>{
  const program = load("!1 loop: !dup end:");

  assertEquals(program.insns.length, 4);
  assertEquals(program.insns[1].op, "label");
  assertEquals(program.insns[1].isLabel(), true);
  assertEquals(
    [...program.labels],
    [["loop", 1], ["end", 3]]
  );
});

test("label names are lowercased", ()=>{
  assertEquals([...load("LoOp:").labels], [["loop", 0]]);
});

test("a colon suffix makes a label even with a bang prefix", ()=>{
  assertEquals([...load("!x:").labels], [["!x", 0]]);
});

test("label op written as an instruction is not a definition", ()=>{
  const program = load("!label");

  assertEquals(program.insns[0].isLabel(), false);
  assertEquals(program.labels.size, 0);
});

// --------------------------------

test("missing direction marker", ()=>{
  const err = assertThrows(() => load("!1 add"), ParseError);

  assertEquals(err.token, "add");
  assertEquals(err.addr, 1);
  assertEquals(err.message, 'Missing direction marker at 1 ("add")');
});

test("duplicate label", ()=>{
  const err = assertThrows(() => load("a: A:"), ParseError);

  assertEquals(err.addr, 1);
});

// --------------------------------

test("serialize", ()=>{
  assertEquals(
    serialize(load("Loop:  !dup\n 3!")),
    "Loop:\n!dup\n3!"
  );
});

test("serialize then load gives the same program", ()=>{
  const program = load("!10 loop: !dup !0 !< !END !jmpif !dup print! !1 !sub !loop !jmp End:");

  assertEquals(load(serialize(program)), program);
});
