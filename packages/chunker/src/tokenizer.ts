import { getEncoding, type Tiktoken } from "js-tiktoken";

export interface ITokenizer {
  count(text: string): number;
}

let encoding: Tiktoken | undefined;

/**
 * cl100k_base, the encoding used by text-embedding-3-small.
 * Special-token strings in the text are counted as plain text.
 */
export class Cl100kTokenizer implements ITokenizer {
  count(text: string): number {
    encoding ??= getEncoding("cl100k_base");
    return encoding.encode(text, [], []).length;
  }
}
