import fs from "fs";
import os from "os";
import path from "path";
import yaml from "js-yaml";
import { DEFAULT_APP_NAME, DEFAULT_DEVICE } from "./ui_model.js";
import { asBool, asStr, die, errorMessage, isRecord, readText } from "./util.js";

export type OutputFormat = "xml" | "json";

export type CaptureConfig = {
  default_device: string;
  app_name: string;
  output_format: OutputFormat;
  escape_xml: boolean;
  verbose: boolean;
};

export type LoadedConfig = {
  config: CaptureConfig;
  source?: string;
};

export type ConfigLookup = {
  explicitPath?: string;
  cwd?: string;
  home?: string;
  warn?: (msg: string) => void;
};

export const CONFIG_BASENAME = ".ciq-trace";

export const defaultConfig: CaptureConfig = {
  default_device: DEFAULT_DEVICE,
  app_name: DEFAULT_APP_NAME,
  output_format: "xml",
  escape_xml: false,
  verbose: false,
};

export function isOutputFormat(v: unknown): v is OutputFormat {
  return v === "xml" || v === "json";
}

export function mergeConfig(raw: unknown): CaptureConfig {
  const r = isRecord(raw) ? raw : {};
  return {
    default_device: asStr(r.default_device) ?? defaultConfig.default_device,
    app_name: asStr(r.app_name) ?? defaultConfig.app_name,
    output_format: isOutputFormat(r.output_format) ? r.output_format : defaultConfig.output_format,
    escape_xml: asBool(r.escape_xml) ?? defaultConfig.escape_xml,
    verbose: asBool(r.verbose) ?? defaultConfig.verbose,
  };
}

export function configCandidates(cwd: string, home: string): string[] {
  return [
    path.join(cwd, `${CONFIG_BASENAME}.yaml`),
    path.join(cwd, `${CONFIG_BASENAME}.json`),
    path.join(home, `${CONFIG_BASENAME}.yaml`),
    path.join(home, `${CONFIG_BASENAME}.json`),
    "/etc/ciq-trace.yaml",
  ];
}

// js-yaml reads the .json candidates too.
function parseConfigFile(file: string): CaptureConfig {
  return mergeConfig(yaml.load(readText(file)));
}

export function loadConfig(lookup: ConfigLookup = {}): LoadedConfig {
  if (lookup.explicitPath) {
    if (!fs.existsSync(lookup.explicitPath)) die(`Config file not found: ${lookup.explicitPath}`);
    return { config: parseConfigFile(lookup.explicitPath), source: lookup.explicitPath };
  }
  const warn = lookup.warn ?? ((msg: string) => console.error(msg));
  for (const file of configCandidates(lookup.cwd ?? process.cwd(), lookup.home ?? os.homedir())) {
    if (!fs.existsSync(file)) continue;
    try {
      return { config: parseConfigFile(file), source: file };
    } catch (e) {
      warn(`Warning: failed to load config ${file}: ${errorMessage(e)}`);
    }
  }
  return { config: { ...defaultConfig } };
}
