/**
 * Text transformations for ConTeXt output: character escaping, smart quotes
 * and the inline verbatim transducer.
 */

const SPECIAL_CHARACTERS = new Set(["\\", "~", "{", "}", "#", "%", "$"]);
const REPLACEMENT_CHARACTER = "\uFFFD";

export const OPENING_QUOTE = "\u201C";
export const CLOSING_QUOTE = "\u201D";

const WHITESPACE = /\s/;

/** Escape each markup-significant character as a `\char` reference. */
export function escapeText(text: string): string {
  let out = "";
  for (const ch of text) {
    if (SPECIAL_CHARACTERS.has(ch)) {
      out += `\\char\`\\${ch}`;
    } else if (ch === REPLACEMENT_CHARACTER) {
      out += "{\\char65533}";
    } else {
      out += ch;
    }
  }
  return out;
}

/**
 * Replace straight double quotes line by line: a quote at the start of a line
 * or after whitespace opens, any other quote closes.
 */
export function smartQuotes(text: string): string {
  return text.split("\n").map(quoteLine).join("\n");
}

function quoteLine(line: string): string {
  let out = "";
  let previous: string | undefined;
  for (const ch of line) {
    if (ch === '"') {
      out += previous === undefined || WHITESPACE.test(previous) ? OPENING_QUOTE : CLOSING_QUOTE;
    } else {
      out += ch;
    }
    previous = ch;
  }
  return out;
}

type VerbatimState = "closed" | "braceRun" | "plusRun";

const RUN_CLOSERS: Record<VerbatimState, string> = {
  closed: "",
  braceRun: "}",
  plusRun: "+",
};

/**
 * Render inline code as `\type` runs.
 *
 * `\type{..}` cannot hold unbalanced braces and `\type+..+` is used for the
 * braces themselves, so the run is split every time the input switches
 * between brace and non-brace characters.
 */
export function toVerbatim(code: string): string {
  let state: VerbatimState = "closed";
  let out = "";
  for (const ch of code) {
    if (ch === "{" || ch === "}") {
      if (state === "braceRun") {
        out += RUN_CLOSERS.braceRun;
        state = "closed";
      }
      if (state === "closed") {
        out += "\\type+";
        state = "plusRun";
      }
    } else {
      if (state === "plusRun") {
        out += RUN_CLOSERS.plusRun;
        state = "closed";
      }
      if (state === "closed") {
        out += "\\type{";
        state = "braceRun";
      }
    }
    out += ch;
  }
  return out + RUN_CLOSERS[state];
}
