#!/usr/bin/env node
import { Command } from "commander";
import { loadConfigFromEnv, resolveConfig, type BridgeConfig } from "./config/config.js";
import { formatDiagnostics } from "./errors/reporter.js";
import type { Diagnostic } from "./errors/diagnostic.js";
import { calculateBmi, greetPerson } from "./compute/health.js";
import { emitForeignText } from "./foreign/module-builder.js";
import { instantiateForeign } from "./foreign/runtime.js";
import { runDemo } from "./cli/demo.js";
import {
  parseMeasure, parseModel, parsePerson, parseWeight, type PersonOptions,
} from "./cli/options.js";
import {
  formatHealthAnalysis, formatPersonInfo, runAnalyze, runProcess, runValidate,
} from "./cli/run.js";

interface PersonCommandOptions extends PersonOptions {
  model?: string;
  json?: boolean;
}

function exitWith(diagnostics: Diagnostic[]): never {
  console.error(formatDiagnostics(diagnostics));
  process.exit(1);
}

function reportWarnings(diagnostics: Diagnostic[]): void {
  if (diagnostics.length > 0) console.error(formatDiagnostics(diagnostics));
}

function fail(e: unknown): never {
  console.error(`Error: ${e instanceof Error ? e.message : String(e)}`);
  process.exit(1);
}

function config(): BridgeConfig {
  return loadConfigFromEnv();
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function withPersonOptions(command: Command): Command {
  return command
    .option("--name <name>", "Person name", "")
    .requiredOption("--age <years>", "Age in whole years")
    .requiredOption("--height <metres>", "Height in metres")
    .option("--email <email>", "Contact email", "")
    .option("--phone <phone>", "Contact phone", "")
    .option("--street <street>", "Street", "")
    .option("--city <city>", "City", "")
    .option("--postal-code <code>", "Postal code", "")
    .option("--model <model>", "How the consumer reaches the person: handle, value or foreign", "handle")
    .option("--json", "Output results as JSON");
}

const program = new Command()
  .name("struct-bridge")
  .description("Consumer-side computation over records owned by a WebAssembly module")
  .version("0.1.0");

program
  .command("demo")
  .description("Construct foreign people and run every entry point against them")
  .action(async () => {
    try {
      const runtime = await instantiateForeign(config());
      runDemo(runtime, (line) => console.log(line));
    } catch (e) {
      fail(e);
    }
  });

withPersonOptions(
  program
    .command("process")
    .description("Summarise a person: adult status, BMI category, name length, city"),
).action(async (opts: PersonCommandOptions) => {
  try {
    const person = parsePerson(opts);
    const model = parseModel(opts.model);
    const diagnostics = [...person.diagnostics, ...model.diagnostics];
    if (person.value === undefined || model.value === undefined) exitWith(diagnostics);
    reportWarnings(diagnostics);

    const runtime = await instantiateForeign(config());
    const info = runProcess(runtime, person.value, model.value);
    if (opts.json) {
      printJson(info);
    } else {
      formatPersonInfo(info, person.value.name).forEach((line) => console.log(line));
    }
  } catch (e) {
    fail(e);
  }
});

withPersonOptions(
  program
    .command("analyze")
    .description("Health analysis for a person at a given weight")
    .requiredOption("--weight <kg>", "Weight in kilograms"),
).action(async (opts: PersonCommandOptions & { weight?: string }) => {
  try {
    const person = parsePerson(opts);
    const weight = parseWeight(opts.weight);
    const model = parseModel(opts.model);
    const diagnostics = [...person.diagnostics, ...weight.diagnostics, ...model.diagnostics];
    if (person.value === undefined || weight.value === undefined || model.value === undefined) {
      exitWith(diagnostics);
    }
    reportWarnings(diagnostics);

    const runtime = await instantiateForeign(config());
    const analysis = runAnalyze(runtime, person.value, weight.value, model.value);
    if (opts.json) {
      printJson(analysis);
    } else {
      formatHealthAnalysis(analysis, person.value.name).forEach((line) => console.log(line));
    }
  } catch (e) {
    fail(e);
  }
});

withPersonOptions(
  program
    .command("validate")
    .description("Check a person's contact details (exit code 2 when invalid)"),
).action(async (opts: PersonCommandOptions) => {
  try {
    const person = parsePerson(opts);
    const model = parseModel(opts.model);
    const diagnostics = [...person.diagnostics, ...model.diagnostics];
    if (person.value === undefined || model.value === undefined) exitWith(diagnostics);
    reportWarnings(diagnostics);

    const runtime = await instantiateForeign(config());
    const valid = runValidate(runtime, person.value, model.value);
    if (opts.json) {
      printJson({ valid });
    } else {
      console.log(valid ? "VALID" : "INVALID");
    }
    if (!valid) process.exitCode = 2;
  } catch (e) {
    fail(e);
  }
});

program
  .command("bmi <weight> <height>")
  .description("Body-mass index from kilograms and metres (0 when height <= 0)")
  .action((weightRaw: string, heightRaw: string) => {
    const weight = parseWeight(weightRaw, "<weight>");
    const height = parseMeasure(heightRaw, "<height>", "metres");
    const diagnostics = [...weight.diagnostics, ...height.diagnostics];
    if (weight.value === undefined || height.value === undefined) exitWith(diagnostics);
    console.log(calculateBmi(weight.value, height.value));
  });

program
  .command("greet [name]")
  .description("Greet someone and print the name's length in code points")
  .action((name: string | undefined) => {
    try {
      const { logger } = resolveConfig(config());
      console.log(greetPerson(name ?? "", logger));
    } catch (e) {
      fail(e);
    }
  });

program
  .command("emit-wat")
  .description("Print the foreign module in WebAssembly text format")
  .action(() => {
    try {
      const { memory } = resolveConfig(config());
      console.log(emitForeignText({ initialPages: memory.initialPages, maximumPages: memory.maximumPages }));
    } catch (e) {
      fail(e);
    }
  });

program.parseAsync(process.argv).catch(fail);
