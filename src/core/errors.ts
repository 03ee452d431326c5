export class DictionaryParseError extends Error {
  constructor(
    readonly path: string,
    readonly line: number,
    readonly content: string,
  ) {
    super(`${path}:${line}: invalid frequency in "${content}"`);
    this.name = "DictionaryParseError";
  }
}
