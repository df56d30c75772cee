import { FileReader } from "./file_reader.ts"

export interface Io {
  write(text: string): void;
  writeByte(byte: number): void;
  readLine(): string | null;
}

const STDIN_FD = 0;

export class StdIo implements Io {
  reader: FileReader;

  constructor() {
    this.reader = new FileReader(STDIN_FD);
  }

  write(text: string) {
    process.stdout.write(text);
  }

  writeByte(byte: number) {
    process.stdout.write(Uint8Array.of(byte));
  }

  readLine(): string | null {
    return this.reader.readLine();
  }
}

// In-memory console: feeds queued input lines and collects output.
export class StringIo implements Io {
  input: string[];
  output: string;

  constructor(input: string[] = []) {
    this.input = [...input];
    this.output = "";
  }

  write(text: string) {
    this.output += text;
  }

  // Bytes are kept as Latin-1 characters.
  writeByte(byte: number) {
    this.output += String.fromCharCode(byte);
  }

  readLine(): string | null {
    return this.input.shift() ?? null;
  }
}
