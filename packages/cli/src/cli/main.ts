#!/usr/bin/env node
/**
 * spooltag CLI - Runtime Wrapper
 * Thin command layer over BridgeClient and the shared tag codec.
 */

import chalk from "chalk";
import yargs from "yargs";
import type { Argv } from "yargs";
import { hideBin } from "yargs/helpers";

import { run as runClone } from "./commands/clone.js";
import { run as runDecode } from "./commands/decode.js";
import { run as runDeriveKeys } from "./commands/derive-keys.js";
import { run as runEncode } from "./commands/encode.js";
import { run as runRead } from "./commands/read.js";
import { run as runStatus } from "./commands/status.js";
import { run as runWatch } from "./commands/watch.js";
import { run as runWrite } from "./commands/write.js";

const DUMP_FORMATS = ["binary", "hex", "base64", "proxmark"];

async function main() {
  await yargs(hideBin(process.argv))
    .scriptName("spooltag")
    .usage("Usage: $0 <command> [options]")
    .strict()
    .option("bridge", {
      type: "string",
      desc: "Bridge base URL (default: $SPOOLTAG_BRIDGE_URL or http://localhost:8000)",
    })
    .option("verbose", {
      type: "boolean",
      desc: "Enable verbose logging",
      default: false,
    })
    .command(
      "status",
      "Show the agent connection and pending request",
      (y: Argv) => y.option("json", { type: "boolean", desc: "Print JSON" }),
      (argv) => runStatus(argv),
    )
    .command(
      "read",
      "Read the next tag touched to the agent's reader",
      (y: Argv) =>
        y
          .option("uid", { type: "string", desc: "Derive keys from this uid instead of the tag's" })
          .option("timeout", { type: "number", desc: "Seconds to wait for a tag" })
          .option("json", { type: "boolean", desc: "Print JSON" })
          .option("out", { type: "string", desc: "Save the dump to this file" })
          .option("format", { choices: DUMP_FORMATS, default: "binary", desc: "Format of --out" }),
      (argv) => runRead(argv),
    )
    .command(
      "write",
      "Write a dump's payload blocks to the next tag touched",
      (y: Argv) =>
        y
          .option("file", { type: "string", demandOption: true, desc: "Dump file (binary, hex, base64 or Proxmark3)" })
          .option("uid", { type: "string", desc: "Derive keys from this uid instead of block 0" })
          .option("timeout", { type: "number", desc: "Seconds to wait for a tag" }),
      (argv) => runWrite(argv),
    )
    .command(
      "clone",
      "Copy a dump onto a blank tag with keys derived from the source uid",
      (y: Argv) =>
        y
          .option("file", { type: "string", demandOption: true, desc: "Source dump file" })
          .option("source-uid", { type: "string", desc: "Source uid (default: block 0 of the dump)" })
          .option("rewrite-uid", { type: "boolean", desc: "Also copy the uid (uid-changeable tags only)" })
          .option("timeout", { type: "number", desc: "Seconds to wait for a tag" }),
      (argv) => runClone(argv),
    )
    .command(
      "derive-keys <uid>",
      "Print the sector keys of a uid (offline)",
      (y: Argv) =>
        y
          .positional("uid", { type: "string", demandOption: true, desc: "Tag uid in hex" })
          .option("json", { type: "boolean", desc: "Print JSON" }),
      (argv) => runDeriveKeys(argv),
    )
    .command(
      "decode",
      "Decode a dump file (offline)",
      (y: Argv) =>
        y
          .option("file", { type: "string", demandOption: true, desc: "Dump file" })
          .option("json", { type: "boolean", desc: "Print JSON" }),
      (argv) => runDecode(argv),
    )
    .command(
      "encode",
      "Build a dump from a JSON file of filament fields (offline)",
      (y: Argv) =>
        y
          .option("file", { type: "string", demandOption: true, desc: "JSON file of filament fields" })
          .option("format", { choices: DUMP_FORMATS, default: "hex", desc: "Output format" })
          .option("out", { type: "string", desc: "Output file (stdout when omitted)" }),
      (argv) => runEncode(argv),
    )
    .command(
      "watch",
      "Follow agent connection and tag events",
      (y) => y,
      (argv) => runWatch(argv),
    )
    .help()
    .alias("h", "help")
    .version("0.1.0")
    .demandCommand(1, "Please specify a command")
    .parseAsync();
}

main().catch((err) => {
  console.error(chalk.red(err instanceof Error ? err.message : String(err)));
  process.exitCode = 1;
});
