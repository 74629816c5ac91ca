import { resolve } from "node:path";

import fg from "fast-glob";
import { load, YAMLException } from "js-yaml";

import { RULE_FILE_EXTENSIONS } from "../constants.js";
import { RuleConfigurationError } from "../errors.js";
import { readTextFile } from "../utils/fs.js";
import { logger } from "../utils/logger.js";
import { dedupe, hasExtension } from "../utils/path.js";
import { RulesEngine } from "./engine.js";

export interface LoadRulesOptions {
  cwd?: string;
}

export async function loadRulesFile(path: string): Promise<RulesEngine> {
  const raw = await readTextFile(path);
  if (raw === null) {
    throw new RuleConfigurationError(`Provided path '${path}' does not exist or is a directory`);
  }

  let document: unknown;
  try {
    document = load(raw, { filename: path });
  } catch (error) {
    if (error instanceof YAMLException) {
      throw new RuleConfigurationError(`Unable to parse rules YAML: ${error.reason}`, path, error);
    }
    throw error;
  }

  const engine = RulesEngine.fromDocument(document, path);
  logger.debug("Loaded rules file", {
    path,
    alerts: engine.alerts.length,
    validations: engine.validations.length,
    exclusions: engine.exclusions.size
  });
  return engine;
}

/**
 * Expand each pattern (a file path or a glob) and merge every matched rules
 * file into one engine. Matches of each pattern are merged in sorted order. A pattern that
 * matches nothing is an error.
 */
export async function loadRulesEngine(patterns: string[], options: LoadRulesOptions = {}): Promise<RulesEngine> {
  if (patterns.length === 0) {
    throw new RuleConfigurationError("No rules files were given");
  }
  const cwd = options.cwd ?? process.cwd();

  const files: string[] = [];
  for (const pattern of patterns) {
    const matches = fg.isDynamicPattern(pattern)
      ? await fg(pattern, { cwd, onlyFiles: true, absolute: true, dot: false })
      : [resolve(cwd, pattern)];
    const selected = matches.filter((file) => hasExtension(file, RULE_FILE_EXTENSIONS));
    if (selected.length === 0) {
      throw new RuleConfigurationError(`No rules files match '${pattern}'`);
    }
    files.push(...selected.sort());
  }

  const engine = new RulesEngine();
  for (const file of dedupe(files)) {
    engine.merge(await loadRulesFile(file));
  }
  logger.info("Rules engine ready", {
    files: dedupe(files).length,
    alerts: engine.alerts.length,
    validations: engine.validations.length
  });
  return engine;
}
