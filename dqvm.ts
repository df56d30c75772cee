import { main } from "./lib/cli.ts"
import { StdIo } from "./lib/io.ts"

process.exitCode = main(process.argv.slice(2), new StdIo());
