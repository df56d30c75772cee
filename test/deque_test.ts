import { test } from "vitest"

import { Deque } from "../lib/deque.ts"
import { assertEquals } from "./asserts.ts"

test("push and pop at the front", ()=>{
  const deque = new Deque<number>();
  deque.pushFront(1);
  deque.pushFront(2);

  assertEquals(deque.popFront(), 2);
  assertEquals(deque.popFront(), 1);
  assertEquals(deque.popFront(), undefined);
});

test("push and pop at the back", ()=>{
  const deque = new Deque<number>();
  deque.pushBack(1);
  deque.pushBack(2);

  assertEquals(deque.popBack(), 2);
  assertEquals(deque.popBack(), 1);
  assertEquals(deque.popBack(), undefined);
});

test("both ends see one store", ()=>{
  const deque = new Deque<number>();
  deque.pushFront(1);
  deque.pushBack(2);

  assertEquals(deque.popBack(), 2);
  assertEquals(deque.popBack(), 1);
  assertEquals(deque.isEmpty(), true);
});

test("grows past its capacity", ()=>{
  const deque = new Deque<number>(2);
  for (let i = 0; i < 5; i++) {
    deque.pushFront(i);
    deque.pushBack(i * 10);
  }

  assertEquals(deque.length, 10);
  assertEquals(deque.toArray(), [4, 3, 2, 1, 0, 0, 10, 20, 30, 40]);
});

test("wraps around the buffer", ()=>{
  const deque = new Deque<number>(4);
  deque.pushBack(1);
  deque.pushBack(2);
  deque.popFront();
  deque.pushBack(3);
  deque.pushBack(4);
  deque.pushBack(5);

  assertEquals(deque.toArray(), [2, 3, 4, 5]);
  assertEquals(deque.popBack(), 5);
  assertEquals(deque.popFront(), 2);
});

test("fromArray keeps order front to back", ()=>{
  const deque = Deque.fromArray([1, 2, 3]);

  assertEquals(deque.popFront(), 1);
  assertEquals(deque.popBack(), 3);
  assertEquals(deque.toArray(), [2]);
});

test("clear", ()=>{
  const deque = Deque.fromArray([1, 2, 3]);
  deque.clear();

  assertEquals(deque.length, 0);
  assertEquals(deque.toArray(), []);
  assertEquals(deque.popFront(), undefined);
});
