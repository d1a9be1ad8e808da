export type { IChunker } from "./chunker.interface.js";
export { RecursiveChunker, DEFAULT_SEPARATORS } from "./recursive-chunker.js";
export { Cl100kTokenizer } from "./tokenizer.js";
export type { ITokenizer } from "./tokenizer.js";
