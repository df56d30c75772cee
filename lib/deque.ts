// Ring buffer; grows by doubling when full.
export class Deque<T> {
  private buf: (T | undefined)[];
  private head: number;
  private size: number;

  constructor(capacity = 16) {
    this.buf = new Array(Math.max(1, capacity));
    this.head = 0;
    this.size = 0;
  }

  get length(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  private index(i: number): number {
    return (this.head + i) % this.buf.length;
  }

  private grow() {
    const newBuf: (T | undefined)[] = new Array(this.buf.length * 2);
    for (let i = 0; i < this.size; i++) {
      newBuf[i] = this.buf[this.index(i)];
    }
    this.buf = newBuf;
    this.head = 0;
  }

  pushFront(val: T) {
    if (this.size === this.buf.length) {
      this.grow();
    }
    this.head = (this.head - 1 + this.buf.length) % this.buf.length;
    this.buf[this.head] = val;
    this.size++;
  }

  pushBack(val: T) {
    if (this.size === this.buf.length) {
      this.grow();
    }
    this.buf[this.index(this.size)] = val;
    this.size++;
  }

  popFront(): T | undefined {
    if (this.size === 0) {
      return undefined;
    }
    const val = this.buf[this.head];
    this.buf[this.head] = undefined;
    this.head = this.index(1);
    this.size--;
    return val;
  }

  popBack(): T | undefined {
    if (this.size === 0) {
      return undefined;
    }
    const i = this.index(this.size - 1);
    const val = this.buf[i];
    this.buf[i] = undefined;
    this.size--;
    return val;
  }

  clear() {
    this.buf = new Array(16);
    this.head = 0;
    this.size = 0;
  }

  *[Symbol.iterator](): IterableIterator<T> {
    for (let i = 0; i < this.size; i++) {
      const val = this.buf[this.index(i)];
      if (val !== undefined) {
        yield val;
      }
    }
  }

  toArray(): T[] {
    return [...this];
  }

  static fromArray<T>(els: T[]): Deque<T> {
    const deque = new Deque<T>(Math.max(16, els.length * 2));
    els.forEach(el => deque.pushBack(el));
    return deque;
  }
}
