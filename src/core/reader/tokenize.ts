// src/core/reader/tokenize.ts
// Position-tracking tokenizer for the macro-call surface syntax

import { makeDiagnostic } from "../../outcome/codes";
import type { Diagnostic } from "../../outcome/diagnostic";
import type { Span } from "../node";

export interface Pos {
  line: number;
  col: number;
}

export type TokTag =
  | "LParen" | "RParen"
  | "LBracket" | "RBracket"
  | "LBrace" | "RBrace"
  | "Quote" | "Deref"
  | "Str" | "Atom";

export interface Tok {
  tag: TokTag;
  s: string;
  start: Pos;
  end: Pos;
}

export class ReaderError extends Error {
  constructor(readonly diagnostic: Diagnostic) {
    super(diagnostic.message);
    this.name = "ReaderError";
  }
}

const DELIMS: Record<string, TokTag> = {
  "(": "LParen",
  ")": "RParen",
  "[": "LBracket",
  "]": "RBracket",
  "{": "LBrace",
  "}": "RBrace",
  "'": "Quote",
  "@": "Deref",
};

// commas are whitespace
const isWS = (c: string) => c === " " || c === "\t" || c === "\n" || c === "\r" || c === ",";

export function spanOf(start: Pos, end: Pos, file?: string): Span {
  return { file, startLine: start.line, startCol: start.col, endLine: end.line, endCol: end.col };
}

export function tokenize(src: string, file?: string): Tok[] {
  const toks: Tok[] = [];
  let i = 0;
  let line = 1;
  let col = 0;

  const here = (): Pos => ({ line, col });
  const advance = () => {
    if (src[i] === "\n") { line++; col = 0; } else { col++; }
    i++;
  };

  while (i < src.length) {
    const c = src[i];

    // comments
    if (c === ";") {
      while (i < src.length && src[i] !== "\n") advance();
      continue;
    }

    if (isWS(c)) { advance(); continue; }

    const delim = DELIMS[c];
    if (delim) {
      const start = here();
      advance();
      toks.push({ tag: delim, s: c, start, end: here() });
      continue;
    }

    if (c === "\"") {
      const start = here();
      advance();
      let s = "";
      let closed = false;
      while (i < src.length) {
        const d = src[i];
        if (d === "\"") { advance(); closed = true; break; }
        if (d === "\\") {
          advance();
          if (i >= src.length) break;
          const e = src[i];
          if (e === "n") s += "\n";
          else if (e === "t") s += "\t";
          else if (e === "r") s += "\r";
          else s += e;
          advance();
          continue;
        }
        s += d;
        advance();
      }
      if (!closed) {
        throw new ReaderError(makeDiagnostic("E0003", {}, spanOf(start, here(), file)));
      }
      toks.push({ tag: "Str", s, start, end: here() });
      continue;
    }

    // atom: read until whitespace or delimiter
    const start = here();
    let a = "";
    while (i < src.length) {
      const d = src[i];
      if (isWS(d) || d === ";" || d === "\"" || (DELIMS[d] && d !== "'" && d !== "@")) break;
      a += d;
      advance();
    }
    toks.push({ tag: "Atom", s: a, start, end: here() });
  }

  return toks;
}
