import fs from "fs";
import os from "os";
import path from "path";
import { parseArgs } from "util";
import { isOutputFormat, loadConfig } from "./config.js";
import { SUPPORTED_DEVICES, isKnownDevice } from "./devices.js";
import { renderJson } from "./render_json.js";
import { renderXml } from "./render_xml.js";
import { parseTraceLog } from "./ui_model.js";
import type { UiStateDocument } from "./ui_state.js";
import { asStr, die, errorMessage, isRecord, readText, writeText } from "./util.js";

export type CliIo = {
  stdout: (data: string) => void;
  stderr: (line: string) => void;
  readStdin: () => string;
  cwd: string;
  home: string;
  now: () => Date;
};

type Command = {
  description: string;
  run: (args: string[], io: CliIo) => number;
};

export const defaultIo: CliIo = {
  stdout: (data) => process.stdout.write(data),
  stderr: (line) => console.error(line),
  readStdin: () => fs.readFileSync(0, "utf8"),
  cwd: process.cwd(),
  home: os.homedir(),
  now: () => new Date(),
};

export function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf8"));
  return (isRecord(pkg) ? asStr(pkg.version) : undefined) ?? "0.0.0";
}

function countByType(doc: UiStateDocument): string {
  const counts = { text: 0, circle: 0, rect: 0 };
  for (const el of doc.elements) counts[el.type] += 1;
  return `text=${counts.text} circle=${counts.circle} rect=${counts.rect}`;
}

function runCapture(args: string[], io: CliIo): number {
  const { values } = parseArgs({
    args,
    options: {
      input: { type: "string", short: "i" },
      output: { type: "string", short: "o" },
      format: { type: "string", short: "f" },
      device: { type: "string", short: "d" },
      "app-name": { type: "string" },
      "escape-xml": { type: "boolean" },
      config: { type: "string", short: "c" },
      verbose: { type: "boolean", short: "v" },
    },
    strict: true,
  });

  const explicitPath = values.config ? path.resolve(io.cwd, values.config) : undefined;
  const { config, source } = loadConfig({ explicitPath, cwd: io.cwd, home: io.home, warn: io.stderr });
  const verbose = values.verbose ?? config.verbose;
  const format = values.format ?? config.output_format;
  if (!isOutputFormat(format)) die(`Unsupported format '${format}' (expected xml or json)`);
  const device = values.device ?? config.default_device;
  const output = values.output ?? `ui-state.${format}`;

  io.stderr("UI capture");
  io.stderr(`Input: ${values.input ?? "stdin"}`);
  io.stderr(`Output: ${output === "-" ? "stdout" : output}`);
  io.stderr(`Format: ${format}`);
  io.stderr(`Device: ${device}`);
  if (verbose) io.stderr(`Config: ${source ?? "defaults"}`);
  if (!isKnownDevice(device)) io.stderr(`Warning: device '${device}' is not in the supported device list`);

  const logText = values.input ? readText(path.resolve(io.cwd, values.input)) : io.readStdin();
  const doc = parseTraceLog(logText, {
    device,
    appName: values["app-name"] ?? config.app_name,
    now: io.now(),
  });
  const data =
    format === "xml"
      ? renderXml(doc, { escapeText: values["escape-xml"] ?? config.escape_xml })
      : renderJson(doc);

  if (output === "-") {
    io.stdout(data);
  } else {
    writeText(path.resolve(io.cwd, output), data);
    io.stderr(`${format.toUpperCase()} UI state saved to: ${output}`);
  }
  if (verbose) io.stderr(`Elements: ${countByType(doc)}`);
  io.stderr(`Captured ${doc.elements.length} UI elements`);
  return 0;
}

function runDevices(args: string[], io: CliIo): number {
  if (args.length > 0 && args[0] !== "list") die(`Unknown devices subcommand '${args[0]}'`);
  io.stdout("Supported devices:\n");
  for (const d of SUPPORTED_DEVICES) io.stdout(`  ${d}\n`);
  return 0;
}

export const COMMANDS: Record<string, Command> = {
  capture: { description: "Convert a render trace log into a UI state document", run: runCapture },
  devices: { description: "List supported device models", run: runDevices },
};

export function helpText(version: string): string {
  const cmds = Object.entries(COMMANDS)
    .map(([name, c]) => `  ${name.padEnd(10)} ${c.description}`)
    .join("\n");
  return [
    `ciq-trace ${version}`,
    "",
    "Usage: ciq-trace <command> [options]",
    "",
    "Commands:",
    cmds,
    "",
    "Global options:",
    "  --version, -V        Show version",
    "  --list-commands, -L  List commands",
    "  --help, -h           Show help",
    "",
    "Capture options:",
    "  --input, -i <file>   Trace log to read (default: stdin)",
    "  --output, -o <file>  Destination, or - for stdout (default: ui-state.<format>)",
    "  --format, -f <fmt>   xml or json (JSON writes whole numbers without .0, e.g. 1 not 1.0)",
    "  --device, -d <name>  Device model recorded in the metadata",
    "  --app-name <name>    App name recorded in the metadata",
    "  --escape-xml         Escape markup characters in XML text",
    "  --config, -c <file>  Config file (YAML or JSON)",
    "  --verbose, -v        Verbose output",
    "",
    "Examples:",
    "  ciq-trace capture --input debug.log --output ui-state.xml",
    "  cat debug.log | ciq-trace capture --format json --output -",
    "",
  ].join("\n");
}

export function runCli(argv: string[], io: CliIo = defaultIo): number {
  const [first, ...rest] = argv;
  try {
    if (first === "--version" || first === "-V") {
      io.stdout(`ciq-trace ${readVersion()}\n`);
      return 0;
    }
    if (first === "--list-commands" || first === "-L") {
      for (const [name, c] of Object.entries(COMMANDS)) io.stdout(`${name.padEnd(10)} ${c.description}\n`);
      return 0;
    }
    if (first === undefined || first === "--help" || first === "-h") {
      io.stdout(helpText(readVersion()));
      return 0;
    }
    const command = COMMANDS[first];
    if (!command) {
      io.stderr(`Error: unknown command '${first}'`);
      io.stderr(`Available commands: ${Object.keys(COMMANDS).join(", ")}`);
      return 1;
    }
    return command.run(rest, io);
  } catch (e) {
    io.stderr(`Error: ${errorMessage(e)}`);
    return 1;
  }
}
