export { type Tok, type TokTag, type Pos, ReaderError, tokenize, spanOf } from "./tokenize";
export { parseAll, readForms, readForm } from "./parse";
