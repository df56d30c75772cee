import { RuntimeExit, VmError } from "./errors.ts"
import { FileReader } from "./file_reader.ts"
import type { Io } from "./io.ts"
import { load, serialize } from "./loader.ts"
import { errorMessage, puts_e, type Logger } from "./utils.ts"
import { Dqvm, Memory } from "./vm.ts"

export const USAGE = `Usage: dqvm [options] <file>

Options:
  --debug, -d    Dump machine state to stderr after every step
  --help, -h     Show this help`;

export const ASM_USAGE = `Usage: dqasm <file>

Prints the program one instruction per line.`;

export interface Args {
  file: string | null;
  debug: boolean;
  help: boolean;
}

export function parseArgs(args: string[]): Args {
  const parsed: Args = { file: null, debug: false, help: false };

  for (const arg of args) {
    if (arg === "--help" || arg === "-h") {
      parsed.help = true;
    } else if (arg === "--debug" || arg === "-d") {
      parsed.debug = true;
    } else if (parsed.file === null) {
      parsed.file = arg;
    }
  }

  return parsed;
}

function readProgram(file: string | null, log: Logger): string | null {
  if (file === null) {
    log("File name is required.");
    return null;
  }

  try {
    return FileReader.readAll(file);
  } catch (err) {
    log(`Could not read file. (${errorMessage(err)})`);
    return null;
  }
}

function report(err: unknown, log: Logger): number {
  if (err instanceof RuntimeExit) {
    log(err.message);
  } else if (err instanceof VmError) {
    log(`${err.name}: ${err.message}`);
  } else {
    throw err;
  }
  return 1;
}

export function main(args: string[], io: Io, log: Logger = puts_e): number {
  const opts = parseArgs(args);
  if (opts.help) {
    io.write(USAGE + "\n");
    return 0;
  }

  const src = readProgram(opts.file, log);
  if (src === null) {
    return 1;
  }

  try {
    const vm = new Dqvm(new Memory(load(src)), io, { debug: opts.debug, log });
    vm.start();
  } catch (err) {
    return report(err, log);
  }

  return 0;
}

export function asmMain(args: string[], io: Io, log: Logger = puts_e): number {
  const opts = parseArgs(args);
  if (opts.help) {
    io.write(ASM_USAGE + "\n");
    return 0;
  }

  const src = readProgram(opts.file, log);
  if (src === null) {
    return 1;
  }

  try {
    io.write(serialize(load(src)) + "\n");
  } catch (err) {
    return report(err, log);
  }

  return 0;
}
