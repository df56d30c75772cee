import { inspect } from "node:util"

const print_e = (arg: unknown) => {
  process.stderr.write(String(arg));
};

export const puts_e = (...args: unknown[]) => {
  for (let arg of args) {
    print_e(String(arg) + "\n");
  }
};

export type Logger = (msg: string) => void;

// --------------------------------

export function errorMessage(err: unknown): string {
  if (err instanceof Error) {
    return err.message;
  }
  return inspect(err);
}
