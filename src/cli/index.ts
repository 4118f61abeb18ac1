#!/usr/bin/env node
import fs from "node:fs";
import path from "node:path";
import { analyzeAliases, loadProgramFile } from "../analyzer/index.js";
import { HELP_TEXT, parseArgs } from "./options.js";

function main(): void {
  const opts = parseArgs(process.argv.slice(2));

  if (opts.help) {
    console.log(HELP_TEXT);
    return;
  }
  if (opts.input === undefined) {
    console.log(HELP_TEXT);
    process.exitCode = 1;
    return;
  }

  const resolvedInput = path.resolve(opts.input);
  if (!fs.existsSync(resolvedInput)) {
    console.error(`Input not found: ${resolvedInput}`);
    process.exitCode = 1;
    return;
  }

  const instructions = loadProgramFile(resolvedInput);
  if (opts.verbose) {
    console.warn(
      `Analyzing ${instructions.length} instruction(s) from ${resolvedInput}`,
    );
  }
  const analysis = analyzeAliases(instructions, {
    verbose: opts.verbose,
    pureFunctions: opts.pureFunctions,
  });

  if (opts.dump) {
    console.log(analysis.dump());
  }

  for (const query of opts.queries) {
    const left = analysis.findOperand(query.left);
    const right = analysis.findOperand(query.right);
    if (!left || !right) {
      const missing = left ? query.right : query.left;
      console.error(`Unknown operand in query: ${missing}`);
      process.exitCode = 1;
      continue;
    }
    console.log(
      `mayAlias(${query.left}, ${query.right}) = ${analysis.mayAlias(left, right)}`,
    );
  }
}

try {
  main();
} catch (err) {
  if (err instanceof Error) console.error(err.message);
  else console.error(err);
  process.exitCode = 1;
}
