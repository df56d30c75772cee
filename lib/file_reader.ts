import fs from "node:fs"

const textDecoder = new TextDecoder();
const LF = "\n".charCodeAt(0);
const CR = "\r".charCodeAt(0);

class ByteBuffer {
  bytes: number[];

  constructor() {
    this.bytes = [];
  }

  push(val: number) {
    this.bytes.push(val);
  }

  isEmpty(): boolean {
    return this.bytes.length === 0;
  }

  toLine() {
    const end = this.bytes[this.bytes.length - 1] === CR
      ? this.bytes.length - 1
      : this.bytes.length;
    return textDecoder.decode(
      new Uint8Array(this.bytes.slice(0, end)),
    );
  }
}

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

/**
 * Blocking line reader over a file descriptor. Lines are returned without
 * their terminator; `null` marks the end of input.
 */
export class FileReader {
  buf: ByteBuffer;
  fd: number;
  lines: string[];
  eof: boolean;
  owned: boolean;

  constructor(fd: number, owned = false) {
    this.buf = new ByteBuffer();
    this.fd = fd;
    this.lines = [];
    this.eof = false;
    this.owned = owned;
  }

  static open(path: string): FileReader {
    return new FileReader(fs.openSync(path, "r"), true);
  }

  // stdin may be in non-blocking mode when attached to a terminal
  _readSync(readBuf: Uint8Array): number {
    while (true) {
      try {
        return fs.readSync(this.fd, readBuf, 0, readBuf.length, null);
      } catch (err) {
        if (isErrnoException(err) && err.code === "EAGAIN") {
          continue;
        }
        if (isErrnoException(err) && err.code === "EOF") {
          return 0;
        }
        throw err;
      }
    }
  }

  read(): number {
    const readBuf = new Uint8Array(1024);

    const numRead = this._readSync(readBuf);
    if (numRead === 0) {
      this.eof = true;
      if (!this.buf.isEmpty()) {
        this.lines.push(this.buf.toLine());
        this.buf = new ByteBuffer();
      }
      return 0;
    }

    for (let i = 0; i < numRead; i++) {
      const val = readBuf[i];

      if (val === LF) {
        this.lines.push(this.buf.toLine());
        this.buf = new ByteBuffer();
      } else {
        this.buf.push(val);
      }
    }

    return numRead;
  }

  readLine(): string | null {
    while (this.lines.length === 0 && !this.eof) {
      this.read();
    }
    return this.lines.shift() ?? null;
  }

  eachLine(fn: (line: string) => void) {
    let line = this.readLine();
    while (line !== null) {
      fn(line);
      line = this.readLine();
    }
  }

  _readAll() {
    const lines: string[] = [];
    this.eachLine(line => {
      lines.push(line);
    });

    return lines.join("\n");
  }

  static readAll(path: string): string {
    const fr = FileReader.open(path);
    try {
      return fr._readAll();
    } finally {
      fr.close();
    }
  }

  close() {
    if (this.owned) {
      fs.closeSync(this.fd);
      this.owned = false;
    }
  }
}
