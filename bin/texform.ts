#!/usr/bin/env npx tsx
// bin/texform.ts
// texform CLI: translate expressions from the command line, a file, or a line REPL.
//
// Run:  npx tsx bin/texform.ts [options] [file]

import * as readline from "readline";
import * as fs from "fs";
import {
  parseCliArgs,
  getHelpText,
  getVersion,
  buildConfig,
  translateSource,
  escapeText,
  formatError,
  type CliConfig,
} from "./texform-cli-lib";
import { loadConfig } from "../src/core/config";
import { createTranslator } from "../src/core/translate";
import { consoleTraceSink, loggingTranslator } from "../src/adapters/logging";
import type { TranslatorPort } from "../src/ports/translator";

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<void> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.help) {
    console.log(getHelpText());
    return;
  }

  if (cliArgs.version) {
    console.log(getVersion());
    return;
  }

  const config = buildConfig(cliArgs);

  if (config.mode === "escape") {
    console.log(escapeText(config.text ?? "", config.scheme, config.debug));
    return;
  }

  const translator = makeTranslator(config);

  if (config.mode === "exec") {
    executeMode(config, translator);
  } else {
    await replMode(config, translator);
  }
}

function makeTranslator(cli: CliConfig): TranslatorPort {
  const config = loadConfig({
    configFile: cli.configFile,
    overrides: cli.trace ? { runtime: { trace: true } } : undefined,
  });
  const sink = config.runtime.trace ? consoleTraceSink() : undefined;
  const translator = createTranslator({ config, trace: sink });
  return sink ? loggingTranslator(translator, sink) : translator;
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (file or --eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(config: CliConfig, translator: TranslatorPort): void {
  const code = config.file ? fs.readFileSync(config.file, "utf8") : config.code ?? "";
  for (const line of translateSource(code, translator, config.debug)) {
    console.log(line);
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

function replMode(config: CliConfig, translator: TranslatorPort): Promise<void> {
  const rl = readline.createInterface({ input: process.stdin, output: process.stdout, prompt: "texform> " });

  return new Promise(resolve => {
    rl.prompt();
    rl.on("line", input => {
      const line = input.trim();
      if (line === ":quit" || line === ":q") {
        rl.close();
        return;
      }
      if (line !== "") {
        try {
          for (const out of translateSource(line, translator, config.debug)) console.log(out);
        } catch (error) {
          console.error(formatError(error));
        }
      }
      rl.prompt();
    });
    rl.on("close", () => resolve());
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main().catch((error: unknown) => {
  console.error(formatError(error));
  process.exit(1);
});
