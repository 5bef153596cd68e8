import type { Writable } from "stream";
import { SGR_RESET } from "./colors.js";
import type { DisplaySink } from "./types.js";

/**
 * Display sink for a terminal: the prefix/message tab becomes a space and
 * every line ends with an SGR reset so colours never bleed.
 */
export function createConsoleSink(out: Writable): DisplaySink {
  return {
    print(_target, _tags, text) {
      out.write(`${text.replace("\t", " ")}${SGR_RESET}\n`);
    },
  };
}
