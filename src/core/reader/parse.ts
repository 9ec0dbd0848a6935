// src/core/reader/parse.ts
// Tokens -> Node trees, every node spanned

import type { Tok, TokTag } from "./tokenize";
import { ReaderError, spanOf, tokenize } from "./tokenize";
import { makeDiagnostic } from "../../outcome/codes";
import type { MapPair, Node, TokenValue } from "../node";
import { list, map, numeral, str, token, vector } from "../node";

const CLOSERS: Partial<Record<TokTag, TokTag>> = {
  LParen: "RParen",
  LBracket: "RBracket",
  LBrace: "RBrace",
};

const NUMERIC = /^[+-]?\d+(\.\d+)?$/;

const PREFIXES: Partial<Record<TokTag, string>> = {
  Quote: "quote",
  Deref: "deref",
};

export function parseAll(toks: Tok[], file?: string): Node[] {
  const out: Node[] = [];
  let i = 0;

  const meta = (start: Tok, end: Tok) => ({ span: spanOf(start.start, end.end, file) });

  function parseOne(): Node {
    const t = toks[i];
    if (!t) {
      const last = toks[toks.length - 1];
      const at = last ? last.end : { line: 1, col: 0 };
      throw new ReaderError(makeDiagnostic("E0001", { detail: "unexpected end of input" }, spanOf(at, at, file)));
    }

    const prefix = PREFIXES[t.tag];
    if (prefix) {
      i++;
      const inner = parseOne();
      const last = toks[i - 1];
      return list([token(prefix, meta(t, t)), inner], meta(t, last));
    }

    const closer = CLOSERS[t.tag];
    if (closer) {
      i++;
      const items: Node[] = [];
      while (true) {
        const u = toks[i];
        if (!u) {
          throw new ReaderError(makeDiagnostic("E0002", { detail: `missing closing for '${t.s}'` }, spanOf(t.start, t.end, file)));
        }
        if (u.tag === closer) { i++; break; }
        items.push(parseOne());
      }
      const m = meta(t, toks[i - 1]);
      if (t.tag === "LParen") return list(items, m);
      if (t.tag === "LBracket") return vector(items, m);
      return map(toPairs(items, t), m);
    }

    if (t.tag === "RParen" || t.tag === "RBracket" || t.tag === "RBrace") {
      throw new ReaderError(makeDiagnostic("E0002", { detail: `unexpected '${t.s}'` }, spanOf(t.start, t.end, file)));
    }

    i++;
    if (t.tag === "Str") return str(t.s, meta(t, t));
    if (NUMERIC.test(t.s)) return numeral(t.s, meta(t, t));
    return token(atomValue(t.s), meta(t, t));
  }

  function toPairs(items: Node[], open: Tok): MapPair[] {
    if (items.length % 2 !== 0) {
      throw new ReaderError(
        makeDiagnostic("E0001", { detail: "map literal must contain an even number of forms" }, spanOf(open.start, open.end, file))
      );
    }
    const pairs: MapPair[] = [];
    for (let k = 0; k < items.length; k += 2) pairs.push([items[k], items[k + 1]]);
    return pairs;
  }

  while (i < toks.length) {
    out.push(parseOne());
  }
  return out;
}

function atomValue(s: string): TokenValue {
  if (s === "nil") return null;
  if (s === "true") return true;
  if (s === "false") return false;
  return s;
}

export function readForms(src: string, file?: string): Node[] {
  return parseAll(tokenize(src, file), file);
}

/**
 * Read exactly one form.
 */
export function readForm(src: string, file?: string): Node {
  const forms = readForms(src, file);
  if (forms.length !== 1) {
    throw new ReaderError(makeDiagnostic("E0001", { detail: `expected one form, got ${forms.length}` }));
  }
  return forms[0];
}
