import { ConfigError } from "../config/errors.js";
import type { LineClass, LineMatcher, PatternOptions } from "./types.js";

function compile(key: string, source: string, flags: string): RegExp {
  try {
    return new RegExp(source, flags);
  } catch (e) {
    const reason = e instanceof Error ? e.message : String(e);
    throw new ConfigError(key, `error compiling ${key}: ${reason}`);
  }
}

export function createMatcher(options: PatternOptions): LineMatcher {
  if (options.match.length === 0) {
    throw new ConfigError("match", "match pattern must not be empty");
  }

  const flags = options.ignoreCase ? "i" : "";
  const match = compile("match", options.match, flags);
  const ignore = options.ignore ? compile("ignore", options.ignore, flags) : null;

  function classify(line: string): LineClass {
    if (ignore && ignore.test(line)) return "normal";
    return match.test(line) ? "error" : "normal";
  }

  return {
    classify,
    isError: (line) => classify(line) === "error",
  };
}

export function isBlankLine(line: string): boolean {
  return line.trim().length === 0;
}
