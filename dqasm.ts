import { asmMain } from "./lib/cli.ts"
import { StdIo } from "./lib/io.ts"

process.exitCode = asmMain(process.argv.slice(2), new StdIo());
